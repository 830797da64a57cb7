import { ArrayMaxSize, IsArray, IsIn, IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength } from 'class-validator';
import { GRADE_TIERS, PROFICIENCY_LEVELS, type GradeTier, type ProficiencyLevel } from '../grade-tiers';
import { ToGradeTier, ToProficiencyLevel } from './tier-transforms';

export class CreatePromptDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  id!: string;

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

  @IsString()
  @IsNotEmpty()
  genre!: string;

  @IsString()
  @IsNotEmpty()
  topic!: string;

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

  @IsOptional()
  @IsArray()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { each: true })
  embedding?: number[];
}
