/**
 * Health Check Controller
 */

import { Controller, Get, HttpException, HttpStatus, Inject } from '@nestjs/common';
import { ConnectionProvider } from '../../shared/database/connection.provider';
import { LoggerService } from '../../shared/logger/logger.service';
import { ApiResponseUtil } from '../../shared/utils/api-response.util';

@Controller('health')
export class HealthController {
  constructor(
    private connectionProvider: ConnectionProvider,
    @Inject(LoggerService)
    private logger: LoggerService,
  ) {}

  @Get()
  async health(): Promise<{ status: 'ok'; db: 'connected' }> {
    try {
      await this.connectionProvider.withConnection((connection) => connection.query('SELECT 1'));
      return { status: 'ok', db: 'connected' };
    } catch (error: unknown) {
      const errorMessage = ApiResponseUtil.messageOf(error);
      this.logger.error(`Health check failed: ${errorMessage}`, undefined, 'HealthController');
      throw new HttpException(ApiResponseUtil.error(errorMessage), HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }
}
