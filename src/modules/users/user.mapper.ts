import { PlanType, User } from '../../entities/user.entity';

export interface UserResponse {
  id: string;
  email: string;
  is_active: boolean;
  is_admin: boolean;
  plan_type: PlanType;
  trial_expires_at: Date | null;
  created_at: Date;
}

export const toUserResponse = (user: User): UserResponse => ({
  id: user.id,
  email: user.email,
  is_active: user.isActive,
  is_admin: user.isAdmin,
  plan_type: user.planType,
  trial_expires_at: user.trialExpiresAt,
  created_at: user.createdAt,
});
