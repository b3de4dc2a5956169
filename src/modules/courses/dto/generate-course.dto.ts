import { Transform } from 'class-transformer';
import { IsEnum, IsOptional, IsString, Length } from 'class-validator';
import {
  CourseLanguage,
  PreferredLevel,
} from '../../../entities/course.entity';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

const trimToNull = ({ value }: { value: unknown }) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
};

const lowerCaseOrNull = ({ value }: { value: unknown }) => {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === '' ? null : normalized;
};

export class GenerateCourseDto {
  @Transform(trim)
  @IsString()
  @Length(1, 200)
  topic!: string;

  @Transform(trimToNull)
  @IsOptional()
  @IsString()
  @Length(10, 300)
  learning_goal?: string | null;

  @Transform(lowerCaseOrNull)
  @IsOptional()
  @IsEnum(PreferredLevel, {
    message: 'preferred_level must be one of: beginner, intermediate, advanced',
  })
  preferred_level?: PreferredLevel | null;

  @Transform(lowerCaseOrNull)
  @IsOptional()
  @IsEnum(CourseLanguage, {
    message: 'language must be one of: english, bengali, hindi',
  })
  language?: CourseLanguage | null;
}
