import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  ManyToOne,
  OneToMany,
  Unique,
} from 'typeorm';
import { CourseModule } from './course-module.entity';
import { UserProgress } from './user-progress.entity';

export enum LessonGenerationStatus {
  UNINITIALIZED = 'uninitialized',
  GENERATING = 'generating',
  READY = 'ready',
}

export interface QuizQuestion {
  question: string;
  options: string[];
  correct_answer_index: number;
  explanation: string;
}

@Entity('lessons')
@Unique(['moduleId', 'orderIndex'])
export class Lesson {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'int' })
  orderIndex!: number;

  // Markdown, written once by the first successful generation
  @Column({ type: 'text', nullable: true })
  content!: string | null;

  @Column({ type: 'simple-json', nullable: true })
  quizData!: QuizQuestion[] | null;

  @Column({ type: Date, nullable: true })
  generatedAt!: Date | null;

  @Column({
    type: 'simple-enum',
    enum: LessonGenerationStatus,
    default: LessonGenerationStatus.UNINITIALIZED,
  })
  generationStatus!: LessonGenerationStatus;

  @Column({ type: Date, nullable: true })
  generationClaimedAt!: Date | null;

  @Column()
  moduleId!: string;

  @ManyToOne(() => CourseModule, (module) => module.lessons, {
    onDelete: 'CASCADE',
  })
  module!: CourseModule;

  @OneToMany(() => UserProgress, (progress) => progress.lesson)
  progress!: UserProgress[];
}
