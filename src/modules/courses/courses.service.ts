import {
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { Course, CourseLanguage } from '../../entities/course.entity';
import { CourseModule } from '../../entities/course-module.entity';
import { Lesson } from '../../entities/lesson.entity';
import { UserProgress } from '../../entities/user-progress.entity';
import { GenerationKind } from '../../entities/token-usage-log.entity';
import { CLOCK, Clock } from '../../common/clock';
import { AiService } from '../ai/ai.service';
import { UsersService } from '../users/users.service';
import { UsageTrackingService } from '../../services/usage-tracking.service';
import { GenerateCourseDto } from './dto/generate-course.dto';
import {
  CourseResponse,
  ProgressResponse,
  toCourseResponse,
  toProgressResponse,
} from './course.mapper';

@Injectable()
export class CoursesService {
  private readonly logger = new Logger(CoursesService.name);

  constructor(
    @InjectRepository(Course)
    private coursesRepository: Repository<Course>,
    @InjectRepository(UserProgress)
    private progressRepository: Repository<UserProgress>,
    private dataSource: DataSource,
    private aiService: AiService,
    private usersService: UsersService,
    private usageTrackingService: UsageTrackingService,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  /**
   * Generate a syllabus for `dto.topic` and persist it together with its
   * usage row. Lessons are stored as outlines; their content is generated on
   * first read.
   */
  async generateCourse(
    userId: string,
    dto: GenerateCourseDto,
  ): Promise<CourseResponse> {
    const user = await this.usersService.findById(userId);
    if (!user) {
      throw new UnauthorizedException();
    }

    await this.usageTrackingService.assertCanGenerate(
      user,
      GenerationKind.COURSE,
    );

    const learningGoal = dto.learning_goal ?? null;
    const preferredLevel = dto.preferred_level ?? null;
    const language = dto.language ?? CourseLanguage.ENGLISH;

    const { result: syllabus, usage } =
      await this.aiService.generateCourseSyllabus({
        topic: dto.topic,
        learningGoal,
        preferredLevel,
        language,
      });

    const courseId = await this.dataSource.transaction(async (manager) => {
      const course = await manager.save(
        manager.create(Course, {
          title: syllabus.title,
          description: syllabus.description,
          topic: dto.topic,
          learningGoal,
          preferredLevel,
          language,
          userId: user.id,
          createdAt: this.clock.now(),
        }),
      );

      for (const generatedModule of syllabus.modules) {
        const module = await manager.save(
          manager.create(CourseModule, {
            title: generatedModule.title,
            orderIndex: generatedModule.orderIndex,
            courseId: course.id,
          }),
        );

        await manager.save(
          generatedModule.lessons.map((lesson) =>
            manager.create(Lesson, {
              title: lesson.title,
              description: lesson.description,
              orderIndex: lesson.orderIndex,
              moduleId: module.id,
            }),
          ),
        );
      }

      await this.usageTrackingService.logUsage(manager, {
        userId: user.id,
        kind: GenerationKind.COURSE,
        usage,
        courseId: course.id,
      });

      return course.id;
    });

    this.logger.log(
      `Generated course ${courseId} for user ${user.id} (${syllabus.modules.length} modules, ${usage.totalTokens} tokens)`,
    );

    return this.findOne(courseId, user.id);
  }

  async findAll(userId: string): Promise<CourseResponse[]> {
    const courses = await this.coursesRepository.find({
      where: { userId },
      relations: { modules: { lessons: true } },
      order: { createdAt: 'DESC', id: 'DESC' },
    });

    const completed = await this.completedLessonsByCourse(
      userId,
      courses.map((course) => course.id),
    );

    return courses.map((course) =>
      toCourseResponse(course, completed.get(course.id) ?? 0),
    );
  }

  async findOne(id: string, userId: string): Promise<CourseResponse> {
    const course = await this.coursesRepository.findOne({
      where: { id },
      relations: { modules: { lessons: true } },
    });
    this.assertOwnership(course, id, userId);

    const completed = await this.completedLessonsByCourse(userId, [id]);
    return toCourseResponse(course, completed.get(id) ?? 0);
  }

  async delete(id: string, userId: string): Promise<void> {
    const course = await this.coursesRepository.findOne({ where: { id } });
    this.assertOwnership(course, id, userId);

    // Modules, lessons and progress rows go with it through ON DELETE CASCADE
    await this.coursesRepository.delete(id);
    this.logger.log(`Deleted course ${id} for user ${userId}`);
  }

  async getProgress(id: string, userId: string): Promise<ProgressResponse[]> {
    const course = await this.coursesRepository.findOne({ where: { id } });
    this.assertOwnership(course, id, userId);

    const progress = await this.progressRepository.find({
      where: { userId, lesson: { module: { courseId: id } } },
      order: { updatedAt: 'ASC' },
    });
    return progress.map(toProgressResponse);
  }

  private assertOwnership(
    course: Course | null,
    id: string,
    userId: string,
  ): asserts course is Course {
    if (!course) {
      throw new NotFoundException(`Course with ID ${id} not found`);
    }
    if (course.userId !== userId) {
      throw new ForbiddenException('Not authorized to access this course');
    }
  }

  private async completedLessonsByCourse(
    userId: string,
    courseIds: string[],
  ): Promise<Map<string, number>> {
    const completed = new Map<string, number>();
    if (courseIds.length === 0) {
      return completed;
    }

    const progress = await this.progressRepository.find({
      where: { userId, lesson: { module: { courseId: In(courseIds) } } },
      relations: { lesson: { module: true } },
    });

    for (const row of progress) {
      if (!row.isCompleted) {
        continue;
      }
      const courseId = row.lesson.module.courseId;
      completed.set(courseId, (completed.get(courseId) ?? 0) + 1);
    }
    return completed;
  }
}
