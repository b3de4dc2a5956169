import { AppSetting } from './app-setting.entity';
import { Course } from './course.entity';
import { CourseModule } from './course-module.entity';
import { Lesson } from './lesson.entity';
import { TokenUsageLog } from './token-usage-log.entity';
import { User } from './user.entity';
import { UserProgress } from './user-progress.entity';

export const entities = [
  User,
  Course,
  CourseModule,
  Lesson,
  UserProgress,
  TokenUsageLog,
  AppSetting,
];
