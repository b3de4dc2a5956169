import * as dotenv from 'dotenv';

dotenv.config();

export const USAGE_CONFIG = 'USAGE_CONFIG';

export interface UsageConfig {
  freeDailyCourseLimit: number;
  freeDailyLessonLimit: number;
  premiumTrialDays: number;
  adminRegistrationKey: string | undefined;
}

export const usageConfig: UsageConfig = {
  freeDailyCourseLimit: Number(process.env.FREE_DAILY_COURSE_LIMIT ?? 1),
  freeDailyLessonLimit: Number(process.env.FREE_DAILY_LESSON_LIMIT ?? 2),
  premiumTrialDays: Number(process.env.PREMIUM_TRIAL_DAYS ?? 7),
  adminRegistrationKey: process.env.ADMIN_REGISTRATION_KEY || undefined,
};
