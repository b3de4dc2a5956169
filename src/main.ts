import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  configureApp(app);
  logger.log(
    `CORS enabled for ${process.env.FRONTEND_URL || 'http://localhost:3000'}`,
  );

  const port = process.env.PORT ?? 3001;
  await app.listen(port, '0.0.0.0');

  let appUrl: string;
  if (process.env.ENVIRONMENT === 'production') {
    appUrl = await app.getUrl();
  } else {
    appUrl = `http://localhost:${port}`;
  }
  logger.log(`Application is running on: ${appUrl}`);
}
bootstrap().catch((error) => {
  console.error('Failed to bootstrap the application:', error);
  process.exit(1);
});
