import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { ExperienceType, ResumeStatus, TargetLanguage } from '@domain/types/profile.types';

export class CreateResumeDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(50000)
  jobDescription!: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  jobTitle?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  companyName?: string;

  @IsOptional()
  @IsString()
  jobUrl?: string;

  @IsOptional()
  @IsIn(Object.values(TargetLanguage))
  targetLanguage?: TargetLanguage;
}

export class TailorResumeDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  maxBullets?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxBulletsPerExperience?: number;

  @IsOptional()
  @IsArray()
  @IsIn(Object.values(ExperienceType), { each: true })
  experienceTypes?: ExperienceType[];

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(50)
  @IsString({ each: true })
  skillsToHighlight?: string[];

  @IsOptional()
  @IsString()
  @MaxLength(100)
  style?: string;
}

export class UpdateResumeStatusDto {
  @IsIn(Object.values(ResumeStatus))
  status!: ResumeStatus;

  @IsOptional()
  @IsString()
  @MaxLength(5000)
  notes?: string;
}

/** Query strings arrive as text; numbers are converted before validation. */
export class ListResumesQueryDto {
  @IsOptional()
  @IsIn(Object.values(ResumeStatus))
  status?: ResumeStatus;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}
