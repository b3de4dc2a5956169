import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThanOrEqual, Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { PlanType, User } from '../../entities/user.entity';
import { CLOCK, Clock } from '../../common/clock';

export interface CreateUserData {
  email: string;
  password: string;
  planType: PlanType;
  trialExpiresAt: Date | null;
  isAdmin?: boolean;
}

@Injectable()
export class UsersService {
  constructor(
    @InjectRepository(User)
    private usersRepository: Repository<User>,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  async findByEmail(email: string): Promise<User | null> {
    return this.usersRepository.findOne({
      where: { email: email.trim().toLowerCase() },
    });
  }

  async findById(id: string): Promise<User | null> {
    return this.usersRepository.findOne({ where: { id } });
  }

  async findAll(): Promise<User[]> {
    return this.usersRepository.find({
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }

  async create(userData: CreateUserData): Promise<User> {
    const hashedPassword = await bcrypt.hash(userData.password, 10);

    const user = this.usersRepository.create({
      email: userData.email.trim().toLowerCase(),
      password: hashedPassword,
      isActive: true,
      isAdmin: userData.isAdmin ?? false,
      planType: userData.planType,
      trialExpiresAt: userData.trialExpiresAt,
      createdAt: this.clock.now(),
    });

    return this.usersRepository.save(user);
  }

  async verifyPassword(user: User, password: string): Promise<boolean> {
    return bcrypt.compare(password, user.password);
  }

  async save(user: User): Promise<User> {
    return this.usersRepository.save(user);
  }

  /**
   * Persist an expired trial as free. Conditional so a concurrent admin
   * assignment is not overwritten.
   */
  async downgradeExpiredTrial(user: User): Promise<void> {
    await this.usersRepository.update(
      {
        id: user.id,
        planType: PlanType.PREMIUM,
        trialExpiresAt: LessThanOrEqual(this.clock.now()),
      },
      { planType: PlanType.FREE },
    );
  }
}
