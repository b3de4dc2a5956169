import request from 'supertest';
import {
  createTestApp,
  generateCourse,
  registerAndLogin,
  TestContext,
} from './utils/test-app';
import { TokenUsageLog } from '../src/entities/token-usage-log.entity';
import { Course } from '../src/entities/course.entity';
import { CourseModule } from '../src/entities/course-module.entity';
import { Lesson } from '../src/entities/lesson.entity';
import { UserProgress } from '../src/entities/user-progress.entity';

const UNKNOWN_ID = '00000000-0000-4000-8000-000000000000';

describe('Courses (e2e)', () => {
  let ctx: TestContext;
  let token: string;

  beforeEach(async () => {
    ctx = await createTestApp();
    token = await registerAndLogin(ctx.app, 'learner@example.com');
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  describe('POST /api/courses/generate', () => {
    it('persists the syllabus renumbered in model order', async () => {
      const response = await generateCourse(ctx.app, token).expect(201);

      expect(response.body).toMatchObject({
        title: 'Intro to Testing',
        description: 'Learn how to write tests that catch real bugs.',
        topic: 'Software testing',
        learning_goal: null,
        preferred_level: null,
        language: 'english',
        created_at: '2026-03-10T12:00:00.000Z',
        progress_percentage: 0,
      });
      expect(response.body.modules).toHaveLength(2);
      expect(response.body.modules[0]).toMatchObject({
        title: 'Foundations',
        order_index: 1,
        course_id: response.body.id,
      });
      expect(
        response.body.modules[0].lessons.map(
          (lesson: { title: string; order_index: number }) => [
            lesson.title,
            lesson.order_index,
          ],
        ),
      ).toEqual([
        ['What Tests Are For', 1],
        ['Writing a First Test', 2],
      ]);
      expect(response.body.modules[1]).toMatchObject({
        title: 'Practice',
        order_index: 2,
      });
      expect(response.body.modules[1].lessons[0]).toMatchObject({
        title: 'Mocks and Fakes',
        description: 'Replacing collaborators.',
        order_index: 1,
        generation_status: 'uninitialized',
      });
    });

    it('writes exactly one course usage row with the reported tokens', async () => {
      const response = await generateCourse(ctx.app, token).expect(201);

      const logs = await ctx.dataSource.getRepository(TokenUsageLog).find();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        kind: 'course',
        courseId: response.body.id,
        lessonId: null,
        inputTokens: 120,
        outputTokens: 380,
        totalTokens: 500,
      });
    });

    it('sends normalized learner context to the model', async () => {
      const response = await generateCourse(ctx.app, token, {
        topic: '  Rust  ',
        learning_goal: '  Build a CLI tool  ',
        preferred_level: 'ADVANCED',
        language: 'Hindi',
      }).expect(201);

      expect(response.body).toMatchObject({
        topic: 'Rust',
        learning_goal: 'Build a CLI tool',
        preferred_level: 'advanced',
        language: 'hindi',
      });
      expect(ctx.gemini.calls[0].model).toBe('gemini-test-model');
      expect(ctx.gemini.calls[0].contents).toContain(
        'Topic: Rust\nPreferred Level: advanced\nLearning Goal: Build a CLI tool\nOutput Language: hindi',
      );
    });

    it('treats a blank learning goal as absent', async () => {
      const response = await generateCourse(ctx.app, token, {
        topic: 'Rust',
        learning_goal: '   ',
      }).expect(201);

      expect(response.body.learning_goal).toBeNull();
      expect(ctx.gemini.calls[0].contents).toContain('Learning Goal: Not provided');
    });

    const invalidBodies: Array<[string, Record<string, unknown>]> = [
      ['a missing topic', {}],
      ['a blank topic', { topic: '   ' }],
      ['an overlong topic', { topic: 'x'.repeat(201) }],
      ['a short learning goal', { topic: 'Rust', learning_goal: 'short' }],
      ['an unknown level', { topic: 'Rust', preferred_level: 'expert' }],
      ['an unsupported language', { topic: 'Rust', language: 'french' }],
    ];

    it.each(invalidBodies)('rejects %s with 422', async (_label, body) => {
      await generateCourse(ctx.app, token, body).expect(422);
      expect(ctx.gemini.calls).toHaveLength(0);
    });

    it('enforces the free daily course limit before calling the model', async () => {
      await generateCourse(ctx.app, token).expect(201);

      const response = await generateCourse(ctx.app, token).expect(429);
      expect(response.body).toEqual({
        statusCode: 429,
        message: 'Free plan limit reached: 1 course per day.',
        error: 'Too Many Requests',
      });
      expect(ctx.gemini.calls).toHaveLength(1);
    });

    it('allows generation again once the day rolls over', async () => {
      await generateCourse(ctx.app, token).expect(201);
      await generateCourse(ctx.app, token).expect(429);

      ctx.clock.advanceDays(1);
      await generateCourse(ctx.app, token).expect(201);
    });

    it('persists nothing and keeps the quota when the model fails', async () => {
      ctx.gemini.failWith(new Error('upstream unavailable'));

      const response = await generateCourse(ctx.app, token).expect(502);
      expect(response.body.message).toBe(
        'Course generation failed. Please try again.',
      );
      expect(await ctx.dataSource.getRepository(Course).count()).toBe(0);
      expect(await ctx.dataSource.getRepository(TokenUsageLog).count()).toBe(0);

      await generateCourse(ctx.app, token).expect(201);
    });

    it('treats a syllabus without modules as a failed generation', async () => {
      ctx.gemini.respondWith({
        text: JSON.stringify({ title: 'Empty', description: 'Nothing', modules: [] }),
      });

      await generateCourse(ctx.app, token).expect(502);
      expect(await ctx.dataSource.getRepository(Course).count()).toBe(0);
    });

    it('requires authentication', async () => {
      await request(ctx.app.getHttpServer())
        .post('/api/courses/generate')
        .send({ topic: 'Rust' })
        .expect(401);
    });
  });

  describe('reading courses', () => {
    it('lists the courses of the caller newest first', async () => {
      await generateCourse(ctx.app, token).expect(201);
      ctx.clock.advanceDays(1);
      await generateCourse(ctx.app, token, { topic: 'Second topic' }).expect(201);

      const response = await request(ctx.app.getHttpServer())
        .get('/api/courses/user/courses')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(response.body.map((course: { topic: string }) => course.topic)).toEqual([
        'Second topic',
        'Software testing',
      ]);
    });

    it('returns 404 for an unknown course and 403 for a foreign one', async () => {
      const created = await generateCourse(ctx.app, token).expect(201);
      const otherToken = await registerAndLogin(ctx.app, 'other@example.com');

      await request(ctx.app.getHttpServer())
        .get(`/api/courses/${UNKNOWN_ID}`)
        .set('Authorization', `Bearer ${token}`)
        .expect(404);

      const forbidden = await request(ctx.app.getHttpServer())
        .get(`/api/courses/${created.body.id}`)
        .set('Authorization', `Bearer ${otherToken}`)
        .expect(403);
      expect(forbidden.body.message).toBe('Not authorized to access this course');

      await request(ctx.app.getHttpServer())
        .delete(`/api/courses/${created.body.id}`)
        .set('Authorization', `Bearer ${otherToken}`)
        .expect(403);
    });

    it('rejects a malformed course id with 400', async () => {
      await request(ctx.app.getHttpServer())
        .get('/api/courses/not-a-uuid')
        .set('Authorization', `Bearer ${token}`)
        .expect(400);
    });
  });

  describe('progress', () => {
    let courseId: string;
    let lessonId: string;

    beforeEach(async () => {
      const created = await generateCourse(ctx.app, token).expect(201);
      courseId = created.body.id;
      lessonId = created.body.modules[0].lessons[0].id;
    });

    const postProgress = (body: Record<string, unknown>, id = lessonId) =>
      request(ctx.app.getHttpServer())
        .post(`/api/courses/lessons/${id}/progress`)
        .set('Authorization', `Bearer ${token}`)
        .send(body);

    it('upserts one progress row per lesson', async () => {
      const first = await postProgress({}).expect(200);
      expect(first.body).toMatchObject({
        lesson_id: lessonId,
        is_completed: true,
        quiz_score: null,
      });

      const scored = await postProgress({ quiz_score: 2 }).expect(200);
      expect(scored.body).toMatchObject({
        id: first.body.id,
        is_completed: true,
        quiz_score: 2,
      });

      // An absent score leaves the stored one alone
      const reopened = await postProgress({ is_completed: false }).expect(200);
      expect(reopened.body).toMatchObject({
        id: first.body.id,
        is_completed: false,
        quiz_score: 2,
      });

      expect(await ctx.dataSource.getRepository(UserProgress).count()).toBe(1);
    });

    it('rejects invalid quiz scores with 422', async () => {
      await postProgress({ quiz_score: -1 }).expect(422);
      await postProgress({ quiz_score: 1.5 }).expect(422);
    });

    it('reports completion as a percentage of all lessons', async () => {
      await postProgress({ is_completed: true }).expect(200);

      const course = await request(ctx.app.getHttpServer())
        .get(`/api/courses/${courseId}`)
        .set('Authorization', `Bearer ${token}`)
        .expect(200);
      expect(course.body.progress_percentage).toBe(33.3);

      const progress = await request(ctx.app.getHttpServer())
        .get(`/api/courses/${courseId}/progress`)
        .set('Authorization', `Bearer ${token}`)
        .expect(200);
      expect(progress.body).toHaveLength(1);
      expect(progress.body[0]).toMatchObject({
        lesson_id: lessonId,
        is_completed: true,
      });
    });

    it('forbids recording progress on a foreign lesson', async () => {
      const otherToken = await registerAndLogin(ctx.app, 'other@example.com');

      await request(ctx.app.getHttpServer())
        .post(`/api/courses/lessons/${lessonId}/progress`)
        .set('Authorization', `Bearer ${otherToken}`)
        .send({})
        .expect(403);
    });
  });

  describe('DELETE /api/courses/:id', () => {
    it('removes the course tree and its progress but keeps usage history', async () => {
      const created = await generateCourse(ctx.app, token).expect(201);
      const lessonId = created.body.modules[0].lessons[0].id;
      await request(ctx.app.getHttpServer())
        .post(`/api/courses/lessons/${lessonId}/progress`)
        .set('Authorization', `Bearer ${token}`)
        .send({})
        .expect(200);

      await request(ctx.app.getHttpServer())
        .delete(`/api/courses/${created.body.id}`)
        .set('Authorization', `Bearer ${token}`)
        .expect(204);

      await request(ctx.app.getHttpServer())
        .get(`/api/courses/${created.body.id}`)
        .set('Authorization', `Bearer ${token}`)
        .expect(404);

      expect(await ctx.dataSource.getRepository(CourseModule).count()).toBe(0);
      expect(await ctx.dataSource.getRepository(Lesson).count()).toBe(0);
      expect(await ctx.dataSource.getRepository(UserProgress).count()).toBe(0);

      const logs = await ctx.dataSource.getRepository(TokenUsageLog).find();
      expect(logs).toHaveLength(1);
      expect(logs[0].courseId).toBeNull();

      // Deleting does not hand the day's quota back
      await generateCourse(ctx.app, token).expect(429);
    });
  });
});
