import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  OneToMany,
  UpdateDateColumn,
} from 'typeorm';
import { Course } from './course.entity';
import { TokenUsageLog } from './token-usage-log.entity';
import { UserProgress } from './user-progress.entity';

export enum PlanType {
  FREE = 'free',
  PREMIUM = 'premium',
}

@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  email!: string;

  @Column()
  password!: string;

  @Column({ default: true })
  isActive!: boolean;

  @Column({ default: false })
  isAdmin!: boolean;

  @Column({ type: 'simple-enum', enum: PlanType, default: PlanType.FREE })
  planType!: PlanType;

  // Null for non-expiring plans (free, admin-assigned premium)
  @Column({ type: Date, nullable: true })
  trialExpiresAt!: Date | null;

  @Column({ type: Date, default: () => 'CURRENT_TIMESTAMP' })
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @OneToMany(() => Course, (course) => course.user)
  courses!: Course[];

  @OneToMany(() => UserProgress, (progress) => progress.user)
  progress!: UserProgress[];

  @OneToMany(() => TokenUsageLog, (log) => log.user)
  usageLogs!: TokenUsageLog[];
}
