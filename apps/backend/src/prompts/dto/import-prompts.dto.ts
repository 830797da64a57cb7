import { Transform } from 'class-transformer';
import { IsBoolean, IsDefined, IsOptional } from 'class-validator';

/** The record list is checked by the corpus against its JSON schema, not here. */
export class ImportPromptsDto {
  @IsDefined()
  records!: unknown;

  @IsOptional()
  @Transform(({ value }) => {
    if (typeof value === 'boolean') {
      return value;
    }
    return value === 'true';
  })
  @IsBoolean()
  replace?: boolean;
}
