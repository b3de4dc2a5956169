import {
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, DataSource, QueryFailedError, Repository } from 'typeorm';
import { setTimeout as sleep } from 'timers/promises';
import {
  Lesson,
  LessonGenerationStatus,
} from '../../entities/lesson.entity';
import { UserProgress } from '../../entities/user-progress.entity';
import { GenerationKind } from '../../entities/token-usage-log.entity';
import { CLOCK, Clock } from '../../common/clock';
import { GenerationFailedException } from '../../common/exceptions/generation-failed.exception';
import {
  GENERATION_CONFIG,
  GenerationConfig,
} from '../../config/generation.config';
import { AiService } from '../ai/ai.service';
import { UsersService } from '../users/users.service';
import { UsageTrackingService } from '../../services/usage-tracking.service';
import { UpdateProgressDto } from './dto/update-progress.dto';
import {
  LessonContentResponse,
  ProgressResponse,
  toLessonContentResponse,
  toProgressResponse,
} from './course.mapper';

@Injectable()
export class LessonsService {
  private readonly logger = new Logger(LessonsService.name);

  constructor(
    @InjectRepository(Lesson)
    private lessonsRepository: Repository<Lesson>,
    @InjectRepository(UserProgress)
    private progressRepository: Repository<UserProgress>,
    private dataSource: DataSource,
    private aiService: AiService,
    private usersService: UsersService,
    private usageTrackingService: UsageTrackingService,
    @Inject(GENERATION_CONFIG) private config: GenerationConfig,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  /**
   * Return a lesson, generating its content on the first read.
   *
   * Content is written at most once. Concurrent first reads race for a claim
   * on the row; the winner calls the model while the others wait for the
   * stored result.
   */
  async getLesson(id: string, userId: string): Promise<LessonContentResponse> {
    const lesson = await this.findOwnedLesson(id, userId);
    const courseId = lesson.module.courseId;

    const ready =
      lesson.content === null ? await this.generateOrWait(lesson, userId) : lesson;

    const progress = await this.progressRepository.find({
      where: { userId, lessonId: id },
    });
    return toLessonContentResponse(ready, courseId, progress);
  }

  async updateProgress(
    lessonId: string,
    userId: string,
    dto: UpdateProgressDto,
  ): Promise<ProgressResponse> {
    await this.findOwnedLesson(lessonId, userId);

    try {
      return await this.saveProgress(lessonId, userId, dto);
    } catch (error: unknown) {
      if (!(error instanceof QueryFailedError)) {
        throw error;
      }
      // A concurrent first write inserted the (user, lesson) row; update it instead
      this.logger.debug(`Retrying progress write for lesson ${lessonId}: ${error.message}`);
      return this.saveProgress(lessonId, userId, dto);
    }
  }

  private async saveProgress(
    lessonId: string,
    userId: string,
    dto: UpdateProgressDto,
  ): Promise<ProgressResponse> {
    const progress =
      (await this.progressRepository.findOne({ where: { userId, lessonId } })) ??
      this.progressRepository.create({ userId, lessonId, quizScore: null });

    progress.isCompleted = dto.is_completed ?? true;
    if (dto.quiz_score !== undefined) {
      progress.quizScore = dto.quiz_score;
    }

    return toProgressResponse(
      await this.progressRepository.save(progress, { transaction: false }),
    );
  }

  private async findOwnedLesson(id: string, userId: string): Promise<Lesson> {
    const lesson = await this.lessonsRepository.findOne({
      where: { id },
      relations: { module: { course: true } },
    });

    if (!lesson) {
      throw new NotFoundException(`Lesson with ID ${id} not found`);
    }
    if (lesson.module.course.userId !== userId) {
      throw new ForbiddenException('Not authorized to access this lesson');
    }
    return lesson;
  }

  private async generateOrWait(lesson: Lesson, userId: string): Promise<Lesson> {
    if (await this.claim(lesson.id)) {
      return this.generate(lesson, userId);
    }

    this.logger.debug(`Lesson ${lesson.id} is being generated elsewhere, waiting`);
    return this.waitForContent(lesson.id);
  }

  /**
   * Move the lesson to `generating` if nobody holds a live claim on it.
   * Resolves true for exactly one of any number of concurrent callers.
   */
  private async claim(id: string): Promise<boolean> {
    const now = this.clock.now();
    const staleBefore = new Date(now.getTime() - this.config.claimTtlMs);

    const result = await this.lessonsRepository
      .createQueryBuilder()
      .update(Lesson)
      .set({
        generationStatus: LessonGenerationStatus.GENERATING,
        generationClaimedAt: now,
      })
      .where('id = :id', { id })
      .andWhere('content IS NULL')
      .andWhere(
        new Brackets((qb) => {
          qb.where('"generationStatus" = :uninitialized', {
            uninitialized: LessonGenerationStatus.UNINITIALIZED,
          }).orWhere('"generationClaimedAt" < :staleBefore', { staleBefore });
        }),
      )
      .execute();

    return result.affected === 1;
  }

  private async releaseClaim(id: string): Promise<void> {
    await this.lessonsRepository
      .createQueryBuilder()
      .update(Lesson)
      .set({
        generationStatus: LessonGenerationStatus.UNINITIALIZED,
        generationClaimedAt: null,
      })
      .where('id = :id', { id })
      .andWhere('content IS NULL')
      .andWhere('"generationStatus" = :generating', {
        generating: LessonGenerationStatus.GENERATING,
      })
      .execute();
  }

  private async generate(lesson: Lesson, userId: string): Promise<Lesson> {
    try {
      const user = await this.usersService.findById(userId);
      if (!user) {
        throw new UnauthorizedException();
      }
      await this.usageTrackingService.assertCanGenerate(
        user,
        GenerationKind.LESSON,
      );

      const course = lesson.module.course;
      const { result, usage } = await this.aiService.generateLessonContent({
        courseTitle: course.title,
        moduleTitle: lesson.module.title,
        lessonTitle: lesson.title,
        lessonDescription: lesson.description,
        learningGoal: course.learningGoal,
        preferredLevel: course.preferredLevel,
        language: course.language,
      });

      const stored = await this.dataSource.transaction(async (manager) => {
        const update = await manager
          .createQueryBuilder()
          .update(Lesson)
          .set({
            content: result.contentMarkdown,
            quizData: result.quiz,
            generatedAt: this.clock.now(),
            generationStatus: LessonGenerationStatus.READY,
            generationClaimedAt: null,
          })
          .where('id = :id', { id: lesson.id })
          .andWhere('content IS NULL')
          .andWhere('"generationStatus" = :generating', {
            generating: LessonGenerationStatus.GENERATING,
          })
          .execute();

        if (update.affected !== 1) {
          return false;
        }

        await this.usageTrackingService.logUsage(manager, {
          userId,
          kind: GenerationKind.LESSON,
          usage,
          lessonId: lesson.id,
        });
        return true;
      });

      if (stored) {
        this.logger.log(
          `Generated lesson ${lesson.id} for user ${userId} (${usage.totalTokens} tokens)`,
        );
      } else {
        this.logger.warn(
          `Lesson ${lesson.id} was completed or removed by another request, discarding this result`,
        );
      }
    } catch (error: unknown) {
      await this.releaseClaim(lesson.id);
      throw error;
    }

    const current = await this.lessonsRepository.findOneBy({ id: lesson.id });
    if (!current) {
      throw new NotFoundException(`Lesson with ID ${lesson.id} not found`);
    }
    return current;
  }

  private async waitForContent(id: string): Promise<Lesson> {
    const deadline = this.clock.now().getTime() + this.config.waitTimeoutMs;

    for (;;) {
      const current = await this.lessonsRepository.findOneBy({ id });
      if (!current) {
        throw new NotFoundException(`Lesson with ID ${id} not found`);
      }
      if (current.content !== null) {
        return current;
      }
      if (current.generationStatus === LessonGenerationStatus.UNINITIALIZED) {
        throw new GenerationFailedException(
          'Lesson generation failed. Please try again.',
        );
      }
      if (this.clock.now().getTime() >= deadline) {
        throw new GenerationFailedException(
          'Timed out waiting for lesson generation. Please try again.',
        );
      }
      await sleep(this.config.pollIntervalMs);
    }
  }
}
