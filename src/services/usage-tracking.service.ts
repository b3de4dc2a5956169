import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { And, EntityManager, LessThan, MoreThanOrEqual, Repository } from 'typeorm';
import {
  GenerationKind,
  TokenUsageLog,
} from '../entities/token-usage-log.entity';
import { PlanType, User } from '../entities/user.entity';
import { USAGE_CONFIG, UsageConfig } from '../config/usage.config';
import { CLOCK, Clock } from '../common/clock';
import { dayWindow, daysLeft } from '../common/helpers/plan.helper';
import { QuotaExceededException } from '../common/exceptions/quota-exceeded.exception';
import { TokenUsage } from '../modules/ai/ai.types';
import { PlanService } from './plan.service';

export interface UsageSummary {
  plan_type: PlanType;
  trial_expires_at: Date | null;
  trial_days_left: number;
  limits: { courses_per_day: number; lessons_per_day: number } | null;
  used_today: { courses: number; lessons: number };
  remaining_today: { courses: number; lessons: number } | null;
}

export interface UsageLogData {
  userId: string;
  kind: GenerationKind;
  usage: TokenUsage;
  courseId?: string;
  lessonId?: string;
}

@Injectable()
export class UsageTrackingService {
  private readonly logger = new Logger(UsageTrackingService.name);

  constructor(
    @InjectRepository(TokenUsageLog)
    private usageLogRepository: Repository<TokenUsageLog>,
    private planService: PlanService,
    @Inject(USAGE_CONFIG) private usageConfig: UsageConfig,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  dailyLimit(kind: GenerationKind): number {
    return kind === GenerationKind.COURSE
      ? this.usageConfig.freeDailyCourseLimit
      : this.usageConfig.freeDailyLessonLimit;
  }

  /**
   * Number of generations of `kind` logged for the user in the current day.
   */
  async countToday(userId: string, kind: GenerationKind): Promise<number> {
    const { start, end } = dayWindow(this.clock.now());
    return this.usageLogRepository.count({
      where: {
        userId,
        kind,
        createdAt: And(MoreThanOrEqual(start), LessThan(end)),
      },
    });
  }

  /**
   * Reject the request with 429 when a free-plan user has used up today's
   * quota for `kind`. Premium users are never limited.
   *
   * The count and the later log write are not serialized, so simultaneous
   * requests can overshoot the limit by one.
   */
  async assertCanGenerate(user: User, kind: GenerationKind): Promise<void> {
    const plan = await this.planService.resolveEffectivePlan(user);
    if (plan === PlanType.PREMIUM) {
      return;
    }

    const limit = this.dailyLimit(kind);
    const usedToday = await this.countToday(user.id, kind);
    if (usedToday >= limit) {
      this.logger.warn(
        `User ${user.id} hit the free ${kind} limit (${usedToday}/${limit})`,
      );
      throw new QuotaExceededException(
        `Free plan limit reached: ${limit} ${limit === 1 ? kind : `${kind}s`} per day.`,
      );
    }
  }

  /**
   * Append a usage row inside the caller's transaction.
   */
  async logUsage(manager: EntityManager, data: UsageLogData): Promise<TokenUsageLog> {
    const log = manager.create(TokenUsageLog, {
      userId: data.userId,
      kind: data.kind,
      inputTokens: data.usage.inputTokens,
      outputTokens: data.usage.outputTokens,
      totalTokens: data.usage.totalTokens,
      courseId: data.courseId ?? null,
      lessonId: data.lessonId ?? null,
      createdAt: this.clock.now(),
    });
    return manager.save(log);
  }

  async getUsageSummary(user: User): Promise<UsageSummary> {
    const plan = await this.planService.resolveEffectivePlan(user);
    const [courses, lessons] = await Promise.all([
      this.countToday(user.id, GenerationKind.COURSE),
      this.countToday(user.id, GenerationKind.LESSON),
    ]);

    if (plan === PlanType.PREMIUM) {
      return {
        plan_type: plan,
        trial_expires_at: user.trialExpiresAt,
        trial_days_left: daysLeft(this.clock.now(), user.trialExpiresAt),
        limits: null,
        used_today: { courses, lessons },
        remaining_today: null,
      };
    }

    const courseLimit = this.dailyLimit(GenerationKind.COURSE);
    const lessonLimit = this.dailyLimit(GenerationKind.LESSON);
    return {
      plan_type: plan,
      trial_expires_at: user.trialExpiresAt,
      trial_days_left: 0,
      limits: { courses_per_day: courseLimit, lessons_per_day: lessonLimit },
      used_today: { courses, lessons },
      remaining_today: {
        courses: Math.max(0, courseLimit - courses),
        lessons: Math.max(0, lessonLimit - lessons),
      },
    };
  }
}
