import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { And, LessThan, MoreThanOrEqual, Repository } from 'typeorm';
import { User } from '../entities/user.entity';
import { Course } from '../entities/course.entity';
import { Lesson } from '../entities/lesson.entity';
import { TokenUsageLog } from '../entities/token-usage-log.entity';
import { CLOCK, Clock } from '../common/clock';
import { addDays, dayWindow } from '../common/helpers/plan.helper';
import { toUserResponse, UserResponse } from '../modules/users/user.mapper';

export const DEFAULT_INSIGHTS_DAYS = 14;

export interface AdminStats {
  total_users: number;
  users_registered_today: number;
  active_users: number;
  courses_generated_today: number;
  lessons_generated_today: number;
  total_content_generated_today: number;
  total_token_usage: number;
  token_usage_today: number;
}

export interface DailyRegistrations {
  date: string;
  user_count: number;
}

export interface UserTokenUsage {
  user_id: string;
  email: string;
  total_tokens: number;
  token_usage_today: number;
}

export interface AdminInsights {
  lookback_days: number;
  daily_registrations: DailyRegistrations[];
  today_registered_users: UserResponse[];
  token_usage_per_user: UserTokenUsage[];
}

// Raw aggregates come back as strings from pg and numbers from sqlite
const toCount = (value: string | number | null | undefined): number =>
  Number(value ?? 0);

const isoDate = (date: Date): string => date.toISOString().slice(0, 10);

@Injectable()
export class AdminStatsService {
  constructor(
    @InjectRepository(User)
    private usersRepository: Repository<User>,
    @InjectRepository(Course)
    private coursesRepository: Repository<Course>,
    @InjectRepository(Lesson)
    private lessonsRepository: Repository<Lesson>,
    @InjectRepository(TokenUsageLog)
    private usageLogRepository: Repository<TokenUsageLog>,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  async getStats(): Promise<AdminStats> {
    const { start, end } = dayWindow(this.clock.now());
    const today = And(MoreThanOrEqual(start), LessThan(end));

    const [
      totalUsers,
      usersRegisteredToday,
      coursesGeneratedToday,
      lessonsGeneratedToday,
      activeUsers,
      totalTokenUsage,
      tokenUsageToday,
    ] = await Promise.all([
      this.usersRepository.count(),
      this.usersRepository.count({ where: { createdAt: today } }),
      this.coursesRepository.count({ where: { createdAt: today } }),
      this.lessonsRepository.count({ where: { generatedAt: today } }),
      this.usageLogRepository
        .createQueryBuilder('log')
        .select('COUNT(DISTINCT log.userId)', 'count')
        .where('log.createdAt >= :start AND log.createdAt < :end', { start, end })
        .getRawOne<{ count: string | number }>(),
      this.usageLogRepository
        .createQueryBuilder('log')
        .select('COALESCE(SUM(log.totalTokens), 0)', 'total')
        .getRawOne<{ total: string | number }>(),
      this.usageLogRepository
        .createQueryBuilder('log')
        .select('COALESCE(SUM(log.totalTokens), 0)', 'total')
        .where('log.createdAt >= :start AND log.createdAt < :end', { start, end })
        .getRawOne<{ total: string | number }>(),
    ]);

    return {
      total_users: totalUsers,
      users_registered_today: usersRegisteredToday,
      active_users: toCount(activeUsers?.count),
      courses_generated_today: coursesGeneratedToday,
      lessons_generated_today: lessonsGeneratedToday,
      total_content_generated_today: coursesGeneratedToday + lessonsGeneratedToday,
      total_token_usage: toCount(totalTokenUsage?.total),
      token_usage_today: toCount(tokenUsageToday?.total),
    };
  }

  /**
   * Registrations per day over the last `days` days (today included, oldest
   * first, zero-filled) plus lifetime and today's token usage per user.
   */
  async getInsights(days = DEFAULT_INSIGHTS_DAYS): Promise<AdminInsights> {
    const { start, end } = dayWindow(this.clock.now());
    const lookbackStart = addDays(start, -(days - 1));

    const recentUsers = await this.usersRepository.find({
      where: { createdAt: And(MoreThanOrEqual(lookbackStart), LessThan(end)) },
      order: { createdAt: 'DESC', id: 'DESC' },
    });

    const countsByDate = new Map<string, number>();
    for (const user of recentUsers) {
      const date = isoDate(user.createdAt);
      countsByDate.set(date, (countsByDate.get(date) ?? 0) + 1);
    }

    const dailyRegistrations: DailyRegistrations[] = [];
    for (let offset = 0; offset < days; offset++) {
      const date = isoDate(addDays(lookbackStart, offset));
      dailyRegistrations.push({
        date,
        user_count: countsByDate.get(date) ?? 0,
      });
    }

    const todayRegisteredUsers = recentUsers.filter(
      (user) => user.createdAt >= start,
    );

    const usageRows = await this.usersRepository
      .createQueryBuilder('user')
      .leftJoin('user.usageLogs', 'log')
      .select('user.id', 'user_id')
      .addSelect('user.email', 'email')
      .addSelect('COALESCE(SUM(log.totalTokens), 0)', 'total_tokens')
      .addSelect(
        'COALESCE(SUM(CASE WHEN log.createdAt >= :start AND log.createdAt < :end THEN log.totalTokens ELSE 0 END), 0)',
        'token_usage_today',
      )
      .setParameters({ start, end })
      .groupBy('user.id')
      .addGroupBy('user.email')
      .orderBy('total_tokens', 'DESC')
      .addOrderBy('user.id', 'ASC')
      .getRawMany<{
        user_id: string;
        email: string;
        total_tokens: string | number | null;
        token_usage_today: string | number | null;
      }>();

    return {
      lookback_days: days,
      daily_registrations: dailyRegistrations,
      today_registered_users: todayRegisteredUsers.map(toUserResponse),
      token_usage_per_user: usageRows.map((row) => ({
        user_id: row.user_id,
        email: row.email,
        total_tokens: toCount(row.total_tokens),
        token_usage_today: toCount(row.token_usage_today),
      })),
    };
  }
}
