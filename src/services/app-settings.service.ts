import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AppSetting } from '../entities/app-setting.entity';
import { USAGE_CONFIG, UsageConfig } from '../config/usage.config';
import { clampTrialDays } from '../common/helpers/plan.helper';

export const PREMIUM_TRIAL_DAYS_KEY = 'premium_trial_days';

/**
 * Settings an admin can change at runtime. Values live in `app_settings` and
 * fall back to the environment configuration when unset or unreadable.
 */
@Injectable()
export class AppSettingsService {
  private readonly logger = new Logger(AppSettingsService.name);

  constructor(
    @InjectRepository(AppSetting)
    private appSettingsRepository: Repository<AppSetting>,
    @Inject(USAGE_CONFIG) private usageConfig: UsageConfig,
  ) {}

  async getPremiumTrialDays(): Promise<number> {
    const setting = await this.appSettingsRepository.findOne({
      where: { key: PREMIUM_TRIAL_DAYS_KEY },
    });
    const fallback = clampTrialDays(this.usageConfig.premiumTrialDays);
    if (!setting) {
      return fallback;
    }

    const stored = Number.parseInt(setting.value, 10);
    if (Number.isNaN(stored)) {
      this.logger.warn(
        `Ignoring unreadable ${PREMIUM_TRIAL_DAYS_KEY} setting "${setting.value}"`,
      );
      return fallback;
    }
    return clampTrialDays(stored);
  }

  async setPremiumTrialDays(days: number): Promise<number> {
    const normalized = clampTrialDays(days);
    await this.appSettingsRepository.save({
      key: PREMIUM_TRIAL_DAYS_KEY,
      value: String(normalized),
    });
    this.logger.log(`Premium trial length set to ${normalized} days`);
    return normalized;
  }
}
