import { Inject, Injectable, Logger } from '@nestjs/common';
import { PlanType, User } from '../entities/user.entity';
import { UsersService } from '../modules/users/users.service';
import { CLOCK, Clock } from '../common/clock';
import { effectivePlan } from '../common/helpers/plan.helper';

@Injectable()
export class PlanService {
  private readonly logger = new Logger(PlanService.name);

  constructor(
    private usersService: UsersService,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  /**
   * Resolve the plan the user is on right now, persisting the downgrade of an
   * expired trial. There is no scheduled job: expiry is only ever noticed here.
   */
  async resolveEffectivePlan(user: User): Promise<PlanType> {
    const plan = effectivePlan(
      this.clock.now(),
      user.trialExpiresAt,
      user.planType,
    );

    if (plan !== user.planType) {
      await this.usersService.downgradeExpiredTrial(user);
      this.logger.log(
        `Premium trial of user ${user.id} expired at ${user.trialExpiresAt?.toISOString()}; downgraded to ${plan}`,
      );
      user.planType = plan;
    }

    return plan;
  }
}
