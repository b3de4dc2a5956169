import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import request from 'supertest';
import { featureModules } from '../../src/app.module';
import { AppController } from '../../src/app.controller';
import { AppService } from '../../src/app.service';
import { configureApp } from '../../src/app.setup';
import { entities } from '../../src/entities';
import { CLOCK } from '../../src/common/clock';
import { GEMINI_CLIENT } from '../../src/modules/ai/ai.types';
import { FakeClock } from './fake-clock';
import { FakeGeminiClient } from './fake-gemini';

export const PASSWORD = 'password123';
export const ADMIN_KEY = 'test-admin-key';

export interface TestContext {
  app: INestApplication;
  dataSource: DataSource;
  clock: FakeClock;
  gemini: FakeGeminiClient;
}

/**
 * The full application on an in-memory SQLite database, with the clock and
 * the model client replaced by fakes.
 */
export async function createTestApp(): Promise<TestContext> {
  const clock = new FakeClock();
  const gemini = new FakeGeminiClient();

  const moduleRef = await Test.createTestingModule({
    imports: [
      TypeOrmModule.forRoot({
        type: 'better-sqlite3',
        database: ':memory:',
        entities,
        synchronize: true,
        dropSchema: true,
      }),
      ...featureModules,
    ],
    controllers: [AppController],
    providers: [AppService],
  })
    .overrideProvider(CLOCK)
    .useValue(clock)
    .overrideProvider(GEMINI_CLIENT)
    .useValue(gemini)
    .compile();

  const app = moduleRef.createNestApplication({ logger: false });
  configureApp(app);
  await app.init();

  return { app, dataSource: app.get(DataSource), clock, gemini };
}

export async function registerAndLogin(
  app: INestApplication,
  email: string,
): Promise<string> {
  await request(app.getHttpServer())
    .post('/auth/register')
    .send({ email, password: PASSWORD })
    .expect(201);
  return login(app, email);
}

export async function registerAdminAndLogin(
  app: INestApplication,
  email: string,
): Promise<string> {
  await request(app.getHttpServer())
    .post('/api/admin/register')
    .send({ email, password: PASSWORD, admin_key: ADMIN_KEY })
    .expect(201);
  return login(app, email);
}

export async function login(app: INestApplication, email: string): Promise<string> {
  const response = await request(app.getHttpServer())
    .post('/auth/login')
    .send({ email, password: PASSWORD })
    .expect(200);
  return response.body.access_token;
}

export function generateCourse(
  app: INestApplication,
  token: string,
  body: Record<string, unknown> = { topic: 'Software testing' },
): request.Test {
  return request(app.getHttpServer())
    .post('/api/courses/generate')
    .set('Authorization', `Bearer ${token}`)
    .send(body);
}
