import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AdminController } from './admin.controller';
import { AdminStatsService } from '../services/admin-stats.service';
import { SubscriptionModule } from '../subscription/subscription.module';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { User } from '../entities/user.entity';
import { Course } from '../entities/course.entity';
import { Lesson } from '../entities/lesson.entity';
import { TokenUsageLog } from '../entities/token-usage-log.entity';

@Module({
  imports: [
    TypeOrmModule.forFeature([User, Course, Lesson, TokenUsageLog]),
    SubscriptionModule,
    AuthModule,
    UsersModule,
  ],
  controllers: [AdminController],
  providers: [AdminStatsService],
})
export class AdminModule {}
