import { Type } from 'class-transformer';
import { IsBoolean, IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { PlanType } from '../../entities/user.entity';

export class UpdateUserPlanDto {
  @IsEnum(PlanType, { message: 'plan_type must be one of: free, premium' })
  plan_type!: PlanType;
}

export class UpdateUserStatusDto {
  @IsBoolean()
  is_active!: boolean;
}

export class TrialDaysDto {
  @IsInt()
  @Min(0)
  @Max(365)
  premium_trial_days!: number;
}

export class InsightsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(90)
  days?: number;
}
