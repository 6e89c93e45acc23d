/**
 * Email Inbox API Main Entry Point
 */

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { LoggerService } from '../shared/logger/logger.service';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { HttpConfig, httpConfig } from './config/configuration';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = app.get(LoggerService);
  app.useLogger(logger);

  configureApp(app);

  const { port } = app.get<HttpConfig>(httpConfig.KEY);
  await app.listen(port);
  logger.log(`Email Inbox API is running on: http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('Failed to start application', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
