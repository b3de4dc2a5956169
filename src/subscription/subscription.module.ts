import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PlanService } from '../services/plan.service';
import { UsageTrackingService } from '../services/usage-tracking.service';
import { AppSettingsService } from '../services/app-settings.service';
import { UsageController } from '../controllers/usage.controller';
import { TokenUsageLog } from '../entities/token-usage-log.entity';
import { AppSetting } from '../entities/app-setting.entity';
import { UsersModule } from '../modules/users/users.module';
import { USAGE_CONFIG, usageConfig } from '../config/usage.config';

@Module({
  imports: [TypeOrmModule.forFeature([TokenUsageLog, AppSetting]), UsersModule],
  controllers: [UsageController],
  providers: [
    {
      provide: USAGE_CONFIG,
      useValue: usageConfig,
    },
    PlanService,
    UsageTrackingService,
    AppSettingsService,
  ],
  exports: [USAGE_CONFIG, PlanService, UsageTrackingService, AppSettingsService],
})
export class SubscriptionModule {}
