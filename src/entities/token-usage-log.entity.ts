import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, Index } from 'typeorm';
import { User } from './user.entity';
import { Course } from './course.entity';
import { Lesson } from './lesson.entity';

export enum GenerationKind {
  COURSE = 'course',
  LESSON = 'lesson',
}

/**
 * One row per successful generation event. Rows are never updated; they
 * survive deletion of the course they describe so that daily quotas are not
 * refunded.
 */
@Entity('token_usage_logs')
@Index(['userId', 'kind', 'createdAt'])
export class TokenUsageLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  userId!: string;

  @ManyToOne(() => User, (user) => user.usageLogs, { onDelete: 'CASCADE' })
  user!: User;

  @Column({ type: 'simple-enum', enum: GenerationKind })
  kind!: GenerationKind;

  @Column({ type: 'int', default: 0 })
  inputTokens!: number;

  @Column({ type: 'int', default: 0 })
  outputTokens!: number;

  @Column({ type: 'int', default: 0 })
  totalTokens!: number;

  @Column({ type: 'varchar', nullable: true })
  courseId!: string | null;

  @ManyToOne(() => Course, { onDelete: 'SET NULL', nullable: true })
  course!: Course | null;

  // Unique: a lesson is generated at most once
  @Index({ unique: true })
  @Column({ type: 'varchar', nullable: true })
  lessonId!: string | null;

  @ManyToOne(() => Lesson, { onDelete: 'SET NULL', nullable: true })
  lesson!: Lesson | null;

  @Index()
  @Column({ type: Date, default: () => 'CURRENT_TIMESTAMP' })
  createdAt!: Date;
}
