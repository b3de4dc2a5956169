import {
  Controller,
  Get,
  Request,
  UnauthorizedException,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../modules/auth/jwt-auth.guard';
import { AuthenticatedUserContext } from '../modules/auth/jwt.strategy';
import { UsersService } from '../modules/users/users.service';
import {
  UsageSummary,
  UsageTrackingService,
} from '../services/usage-tracking.service';

@Controller('api/usage')
@UseGuards(JwtAuthGuard)
export class UsageController {
  constructor(
    private usageTrackingService: UsageTrackingService,
    private usersService: UsersService,
  ) {}

  @Get()
  async getUsage(
    @Request() req: { user: AuthenticatedUserContext },
  ): Promise<UsageSummary> {
    const user = await this.usersService.findById(req.user.id);
    if (!user) {
      throw new UnauthorizedException();
    }
    return this.usageTrackingService.getUsageSummary(user);
  }
}
