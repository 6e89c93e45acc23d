/**
 * Cases, AI decisions and risk events
 * GET /cases, GET /ai-decisions, GET /risk-events, each with ?limit=20&offset=0
 */

import { Controller, Get, HttpException, HttpStatus, Inject, Query } from '@nestjs/common';
import { SqlRow } from '../../shared/database/connection.provider';
import { PaginationQueryDto } from '../../shared/dto/pagination-query.dto';
import { LoggerService } from '../../shared/logger/logger.service';
import { ApiResponseUtil } from '../../shared/utils/api-response.util';
import { RecordTable, RecordsService } from './records.service';

@Controller()
export class RecordsController {
  constructor(
    private recordsService: RecordsService,
    @Inject(LoggerService)
    private logger: LoggerService,
  ) {}

  @Get('cases')
  async getCases(@Query() query: PaginationQueryDto): Promise<SqlRow[]> {
    return this.list('cases', query);
  }

  @Get('ai-decisions')
  async getAiDecisions(@Query() query: PaginationQueryDto): Promise<SqlRow[]> {
    return this.list('ai_decisions', query);
  }

  @Get('risk-events')
  async getRiskEvents(@Query() query: PaginationQueryDto): Promise<SqlRow[]> {
    return this.list('risk_events', query);
  }

  private async list(table: RecordTable, query: PaginationQueryDto): Promise<SqlRow[]> {
    try {
      return await this.recordsService.listRecent(table, { limit: query.limit, offset: query.offset });
    } catch (error: unknown) {
      const errorMessage = ApiResponseUtil.messageOf(error);
      this.logger.error(`Error listing ${table}: ${errorMessage}`, undefined, 'RecordsController');
      throw new HttpException(ApiResponseUtil.error(errorMessage), HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }
}
