import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from './auth/jwt-auth.guard';
import { AdminGuard } from './auth/admin.guard';
import { AuthService } from './auth/auth.service';
import { AdminRegisterDto } from './auth/dto/register.dto';
import { UsersService } from './users/users.service';
import { toUserResponse, UserResponse } from './users/user.mapper';
import { User } from '../entities/user.entity';
import {
  AdminInsights,
  AdminStats,
  AdminStatsService,
  DEFAULT_INSIGHTS_DAYS,
} from '../services/admin-stats.service';
import { AppSettingsService } from '../services/app-settings.service';
import {
  InsightsQueryDto,
  TrialDaysDto,
  UpdateUserPlanDto,
  UpdateUserStatusDto,
} from './dto/admin.dto';

interface TrialDaysResponse {
  premium_trial_days: number;
}

@Controller('api/admin')
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(
    private readonly adminStatsService: AdminStatsService,
    private readonly appSettingsService: AppSettingsService,
    private readonly usersService: UsersService,
    private readonly authService: AuthService,
  ) {}

  // Open route; the registration key is the credential
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() adminRegisterDto: AdminRegisterDto): Promise<UserResponse> {
    return this.authService.registerAdmin({
      email: adminRegisterDto.email,
      password: adminRegisterDto.password,
      adminKey: adminRegisterDto.admin_key,
    });
  }

  @UseGuards(JwtAuthGuard, AdminGuard)
  @Get('stats')
  async getStats(): Promise<AdminStats> {
    return this.adminStatsService.getStats();
  }

  @UseGuards(JwtAuthGuard, AdminGuard)
  @Get('insights')
  async getInsights(@Query() query: InsightsQueryDto): Promise<AdminInsights> {
    return this.adminStatsService.getInsights(query.days ?? DEFAULT_INSIGHTS_DAYS);
  }

  @UseGuards(JwtAuthGuard, AdminGuard)
  @Get('users')
  async listUsers(): Promise<UserResponse[]> {
    const users = await this.usersService.findAll();
    return users.map(toUserResponse);
  }

  @UseGuards(JwtAuthGuard, AdminGuard)
  @Patch('users/:id/plan')
  async updateUserPlan(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateUserPlanDto: UpdateUserPlanDto,
  ): Promise<UserResponse> {
    const user = await this.findManagedUser(id, 'plan');
    user.planType = updateUserPlanDto.plan_type;
    // A manual assignment does not expire
    user.trialExpiresAt = null;

    const saved = await this.usersService.save(user);
    this.logger.log(`Set plan of user ${id} to ${saved.planType}`);
    return toUserResponse(saved);
  }

  @UseGuards(JwtAuthGuard, AdminGuard)
  @Patch('users/:id/status')
  async updateUserStatus(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateUserStatusDto: UpdateUserStatusDto,
  ): Promise<UserResponse> {
    const user = await this.findManagedUser(id, 'status');
    user.isActive = updateUserStatusDto.is_active;

    const saved = await this.usersService.save(user);
    this.logger.log(
      `${saved.isActive ? 'Activated' : 'Deactivated'} user ${id}`,
    );
    return toUserResponse(saved);
  }

  @UseGuards(JwtAuthGuard, AdminGuard)
  @Get('settings/trial-days')
  async getTrialDays(): Promise<TrialDaysResponse> {
    return {
      premium_trial_days: await this.appSettingsService.getPremiumTrialDays(),
    };
  }

  @UseGuards(JwtAuthGuard, AdminGuard)
  @Put('settings/trial-days')
  async setTrialDays(@Body() trialDaysDto: TrialDaysDto): Promise<TrialDaysResponse> {
    return {
      premium_trial_days: await this.appSettingsService.setPremiumTrialDays(
        trialDaysDto.premium_trial_days,
      ),
    };
  }

  private async findManagedUser(id: string, field: 'plan' | 'status'): Promise<User> {
    const user = await this.usersService.findById(id);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    if (user.isAdmin) {
      throw new BadRequestException(
        `Admin ${field} cannot be changed from this endpoint`,
      );
    }
    return user;
  }
}
