import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { databaseConfig } from './config/database.config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ClockModule } from './common/clock.module';
import { LoggingMiddleware } from './common/middleware/logging.middleware';
import { UsersModule } from './modules/users/users.module';
import { AuthModule } from './modules/auth/auth.module';
import { CoursesModule } from './modules/courses/courses.module';
import { AiModule } from './modules/ai/ai.module';
import { AdminModule } from './modules/admin.module';
import { SubscriptionModule } from './subscription/subscription.module';

// Everything but the database connection, which the e2e tests swap out
export const featureModules = [
  ConfigModule.forRoot({ isGlobal: true }),
  ClockModule,
  UsersModule,
  AuthModule,
  CoursesModule,
  AiModule,
  SubscriptionModule,
  AdminModule,
];

@Module({
  imports: [
    TypeOrmModule.forRoot(databaseConfig),
    ...featureModules,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(LoggingMiddleware).forRoutes('*');
  }
}
