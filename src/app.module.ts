/**
 * Email Inbox API App Module
 */

import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '../shared/database/database.module';
import { LoggerModule } from '../shared/logger/logger.module';
import { RequestLoggerMiddleware } from '../shared/middleware/request-logger.middleware';
import { databaseConfig, httpConfig, loggingConfig } from './config/configuration';
import { EmailInboxModule } from './email-inbox/email-inbox.module';
import { HealthController } from './health/health.controller';
import { InfoController } from './info/info.controller';
import { RecordsModule } from './records/records.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      load: [databaseConfig, httpConfig, loggingConfig],
    }),
    LoggerModule,
    DatabaseModule,
    EmailInboxModule,
    RecordsModule,
  ],
  controllers: [HealthController, InfoController],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestLoggerMiddleware).forRoutes('*');
  }
}
