import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { GRADE_TIERS, PROFICIENCY_LEVELS, type GradeTier, type ProficiencyLevel } from '../grade-tiers';
import { ToGradeTier, ToProficiencyLevel } from './tier-transforms';

export class SelectPromptDto {
  @ToGradeTier()
  @IsIn(GRADE_TIERS)
  gradeTier!: GradeTier;

  @ToProficiencyLevel()
  @IsIn(PROFICIENCY_LEVELS)
  level!: ProficiencyLevel;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  genre?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  topic?: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  query?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(20)
  k?: number;
}
