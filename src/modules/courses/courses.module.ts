import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Course } from '../../entities/course.entity';
import { Lesson } from '../../entities/lesson.entity';
import { UserProgress } from '../../entities/user-progress.entity';
import {
  GENERATION_CONFIG,
  generationConfig,
} from '../../config/generation.config';
import { CoursesService } from './courses.service';
import { LessonsService } from './lessons.service';
import { CoursesController } from './courses.controller';
import { AiModule } from '../ai/ai.module';
import { UsersModule } from '../users/users.module';
import { SubscriptionModule } from '../../subscription/subscription.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([Course, Lesson, UserProgress]),
    AiModule,
    UsersModule,
    SubscriptionModule,
  ],
  providers: [
    {
      provide: GENERATION_CONFIG,
      useValue: generationConfig,
    },
    CoursesService,
    LessonsService,
  ],
  controllers: [CoursesController],
  exports: [CoursesService, LessonsService],
})
export class CoursesModule {}
