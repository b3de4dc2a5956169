import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  ManyToOne,
  OneToMany,
  Index,
} from 'typeorm';
import { User } from './user.entity';
import { CourseModule } from './course-module.entity';

export enum PreferredLevel {
  BEGINNER = 'beginner',
  INTERMEDIATE = 'intermediate',
  ADVANCED = 'advanced',
}

export enum CourseLanguage {
  ENGLISH = 'english',
  BENGALI = 'bengali',
  HINDI = 'hindi',
}

@Entity('courses')
export class Course {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Index()
  @Column()
  topic!: string;

  @Column({ type: 'text', nullable: true })
  learningGoal!: string | null;

  @Column({ type: 'simple-enum', enum: PreferredLevel, nullable: true })
  preferredLevel!: PreferredLevel | null;

  @Column({
    type: 'simple-enum',
    enum: CourseLanguage,
    default: CourseLanguage.ENGLISH,
  })
  language!: CourseLanguage;

  @Column({ type: Date, default: () => 'CURRENT_TIMESTAMP' })
  createdAt!: Date;

  @Index()
  @Column()
  userId!: string;

  @ManyToOne(() => User, (user) => user.courses, { onDelete: 'CASCADE' })
  user!: User;

  @OneToMany(() => CourseModule, (module) => module.course)
  modules!: CourseModule[];
}
