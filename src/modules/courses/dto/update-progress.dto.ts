import { IsBoolean, IsInt, IsOptional, Min } from 'class-validator';

export class UpdateProgressDto {
  @IsOptional()
  @IsBoolean()
  is_completed?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  quiz_score?: number;
}
