import {
  BadRequestException,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { timingSafeEqual } from 'crypto';
import { UsersService } from '../users/users.service';
import { toUserResponse, UserResponse } from '../users/user.mapper';
import { AppSettingsService } from '../../services/app-settings.service';
import { PlanType, User } from '../../entities/user.entity';
import { CLOCK, Clock } from '../../common/clock';
import { addDays } from '../../common/helpers/plan.helper';
import { USAGE_CONFIG, UsageConfig } from '../../config/usage.config';
import { JwtPayload } from './jwt.strategy';

export interface AccessTokenResponse {
  access_token: string;
  token_type: 'bearer';
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private usersService: UsersService,
    private jwtService: JwtService,
    private appSettingsService: AppSettingsService,
    @Inject(USAGE_CONFIG) private usageConfig: UsageConfig,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  async validateUser(email: string, password: string): Promise<User | null> {
    const user = await this.usersService.findByEmail(email);
    if (!user) {
      return null;
    }

    const isPasswordValid = await this.usersService.verifyPassword(
      user,
      password,
    );
    return isPasswordValid ? user : null;
  }

  login(user: User): AccessTokenResponse {
    const payload: JwtPayload = { sub: user.id, email: user.email };
    return {
      access_token: this.jwtService.sign(payload),
      token_type: 'bearer',
    };
  }

  /**
   * New learners start on a premium trial of the configured length, or on
   * the free plan when the trial length is 0.
   */
  async register(userData: {
    email: string;
    password: string;
  }): Promise<UserResponse> {
    await this.assertEmailAvailable(userData.email);

    const trialDays = await this.appSettingsService.getPremiumTrialDays();
    const onTrial = trialDays > 0;

    const user = await this.usersService.create({
      email: userData.email,
      password: userData.password,
      planType: onTrial ? PlanType.PREMIUM : PlanType.FREE,
      trialExpiresAt: onTrial ? addDays(this.clock.now(), trialDays) : null,
    });

    this.logger.log(
      `Registered user ${user.id} on the ${user.planType} plan${onTrial ? ` (${trialDays}-day trial)` : ''}`,
    );
    return toUserResponse(user);
  }

  async registerAdmin(adminData: {
    email: string;
    password: string;
    adminKey: string;
  }): Promise<UserResponse> {
    if (!this.isValidAdminKey(adminData.adminKey)) {
      this.logger.warn(`Rejected admin registration for ${adminData.email}`);
      throw new ForbiddenException('Invalid admin registration key');
    }
    await this.assertEmailAvailable(adminData.email);

    const admin = await this.usersService.create({
      email: adminData.email,
      password: adminData.password,
      isAdmin: true,
      planType: PlanType.PREMIUM,
      trialExpiresAt: null,
    });

    this.logger.log(`Registered admin ${admin.id}`);
    return toUserResponse(admin);
  }

  private async assertEmailAvailable(email: string): Promise<void> {
    const existingUser = await this.usersService.findByEmail(email);
    if (existingUser) {
      throw new BadRequestException(
        'The user with this email already exists in the system',
      );
    }
  }

  private isValidAdminKey(candidate: string): boolean {
    const expected = this.usageConfig.adminRegistrationKey;
    if (!expected) {
      return false;
    }
    const a = Buffer.from(candidate);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
  }
}
