import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { GRADE_TIERS, PROFICIENCY_LEVELS, type GradeTier, type ProficiencyLevel } from '../grade-tiers';
import { ToGradeTier, ToProficiencyLevel } from './tier-transforms';

export class RecommendPromptsDto {
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
  @MaxLength(100, { each: true })
  recentTopics?: string[];

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10)
  limit?: number;
}
