import request from 'supertest';
import {
  createTestApp,
  generateCourse,
  PASSWORD,
  registerAdminAndLogin,
  registerAndLogin,
  login,
  TestContext,
} from './utils/test-app';
import { PlanType, User } from '../src/entities/user.entity';

describe('Plans and usage (e2e)', () => {
  let ctx: TestContext;

  const getUsage = (token: string) =>
    request(ctx.app.getHttpServer())
      .get('/api/usage')
      .set('Authorization', `Bearer ${token}`);

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it('reports free-plan limits and what is left today', async () => {
    const token = await registerAndLogin(ctx.app, 'learner@example.com');

    const fresh = await getUsage(token).expect(200);
    expect(fresh.body).toEqual({
      plan_type: 'free',
      trial_expires_at: null,
      trial_days_left: 0,
      limits: { courses_per_day: 1, lessons_per_day: 2 },
      used_today: { courses: 0, lessons: 0 },
      remaining_today: { courses: 1, lessons: 2 },
    });

    await generateCourse(ctx.app, token).expect(201);

    const used = await getUsage(token).expect(200);
    expect(used.body.used_today).toEqual({ courses: 1, lessons: 0 });
    expect(used.body.remaining_today).toEqual({ courses: 0, lessons: 2 });
  });

  describe('premium trials', () => {
    let token: string;

    beforeEach(async () => {
      const adminToken = await registerAdminAndLogin(ctx.app, 'admin@example.com');
      await request(ctx.app.getHttpServer())
        .put('/api/admin/settings/trial-days')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ premium_trial_days: 7 })
        .expect(200);

      const registered = await request(ctx.app.getHttpServer())
        .post('/auth/register')
        .send({ email: 'trial@example.com', password: PASSWORD })
        .expect(201);
      expect(registered.body).toMatchObject({
        plan_type: 'premium',
        trial_expires_at: '2026-03-17T12:00:00.000Z',
      });
      token = await login(ctx.app, 'trial@example.com');
    });

    it('lets trial users generate without limits', async () => {
      await generateCourse(ctx.app, token).expect(201);
      await generateCourse(ctx.app, token).expect(201);

      const usage = await getUsage(token).expect(200);
      expect(usage.body).toEqual({
        plan_type: 'premium',
        trial_expires_at: '2026-03-17T12:00:00.000Z',
        trial_days_left: 7,
        limits: null,
        used_today: { courses: 2, lessons: 0 },
        remaining_today: null,
      });
    });

    it('downgrades and persists an expired trial on the next request', async () => {
      ctx.clock.advanceDays(7);

      const usage = await getUsage(token).expect(200);
      expect(usage.body.plan_type).toBe('free');
      expect(usage.body.trial_days_left).toBe(0);

      const stored = await ctx.dataSource
        .getRepository(User)
        .findOneByOrFail({ email: 'trial@example.com' });
      expect(stored.planType).toBe(PlanType.FREE);

      await generateCourse(ctx.app, token).expect(201);
      await generateCourse(ctx.app, token).expect(429);
    });

    it('counts the remaining trial days rounded up', async () => {
      ctx.clock.advanceMinutes(2 * 24 * 60 + 1);

      const usage = await getUsage(token).expect(200);
      expect(usage.body.trial_days_left).toBe(5);
    });
  });
});
