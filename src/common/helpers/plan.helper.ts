import { PlanType } from '../../entities/user.entity';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * The plan a user is actually on at `now`. A premium trial whose expiry has
 * passed counts as free even before the downgrade is persisted.
 */
export const effectivePlan = (
  now: Date,
  trialExpiresAt: Date | null,
  storedPlan: PlanType,
): PlanType => {
  if (
    storedPlan === PlanType.PREMIUM &&
    trialExpiresAt !== null &&
    trialExpiresAt.getTime() <= now.getTime()
  ) {
    return PlanType.FREE;
  }
  return storedPlan;
};

/**
 * Start (inclusive) and end (exclusive) of the UTC calendar day containing `now`.
 */
export const dayWindow = (now: Date): { start: Date; end: Date } => {
  const start = new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()),
  );
  return { start, end: new Date(start.getTime() + DAY_MS) };
};

export const addDays = (date: Date, days: number): Date =>
  new Date(date.getTime() + days * DAY_MS);

/**
 * Whole days left before `expiresAt`, rounded up; 0 once expired.
 */
export const daysLeft = (now: Date, expiresAt: Date | null): number => {
  if (!expiresAt || expiresAt.getTime() <= now.getTime()) {
    return 0;
  }
  return Math.ceil((expiresAt.getTime() - now.getTime()) / DAY_MS);
};

export const clampTrialDays = (value: number): number =>
  Math.max(0, Math.min(365, Math.trunc(value)));
