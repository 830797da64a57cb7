import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { ToGradeTier, ToProficiencyLevel } from '../../prompts/dto/tier-transforms';
import {
  GRADE_TIERS,
  PROFICIENCY_LEVELS,
  type GradeTier,
  type ProficiencyLevel,
} from '../../prompts/grade-tiers';

export class InlinePromptDto {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsString()
  @IsNotEmpty()
  prompt!: string;

  @ToGradeTier()
  @IsIn(GRADE_TIERS)
  gradeTier!: GradeTier;

  @ToProficiencyLevel()
  @IsIn(PROFICIENCY_LEVELS)
  level!: ProficiencyLevel;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  requirements?: string[];

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(30)
  @IsString({ each: true })
  keywords?: string[];
}

/** Range and sum checks happen in `RubricWeights.create` and answer CONFIGURATION_ERROR. */
export class RubricWeightsDto {
  @Type(() => Number)
  @IsNumber()
  grammar!: number;

  @Type(() => Number)
  @IsNumber()
  vocabulary!: number;

  @Type(() => Number)
  @IsNumber()
  content!: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  minWords?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  maxWords?: number;
}

export class GradeEssayDto {
  // Blank text is rejected by the coordinator as INVALID_INPUT.
  @IsString()
  @MaxLength(20000)
  essay!: string;

  @IsOptional()
  @IsString()
  promptId?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => InlinePromptDto)
  prompt?: InlinePromptDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => RubricWeightsDto)
  weights?: RubricWeightsDto;
}
