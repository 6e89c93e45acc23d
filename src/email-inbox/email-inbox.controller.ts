/**
 * Email Inbox Controller
 * Ingests inbound email records and serves them back.
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Inject,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { PaginationQueryDto } from '../../shared/dto/pagination-query.dto';
import { RecordNotFoundError } from '../../shared/errors/database.errors';
import { LoggerService } from '../../shared/logger/logger.service';
import { ApiResponseUtil, InsertedResponse } from '../../shared/utils/api-response.util';
import { createParseIdPipe } from '../../shared/validation/validation-pipe';
import { CreateEmailInboxDto } from './dto/create-email-inbox.dto';
import { EmailInboxService } from './email-inbox.service';
import { EmailInboxRow } from './email-inbox.types';

@Controller('email-inbox')
export class EmailInboxController {
  constructor(
    private emailInboxService: EmailInboxService,
    @Inject(LoggerService)
    private logger: LoggerService,
  ) {}

  /**
   * Store one inbound email
   * POST /email-inbox
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async insert(@Body() dto: CreateEmailInboxDto): Promise<InsertedResponse<EmailInboxRow>> {
    try {
      const row = await this.emailInboxService.insert(dto);
      return ApiResponseUtil.inserted(row);
    } catch (error: unknown) {
      const errorMessage = ApiResponseUtil.messageOf(error);
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Insert failed: ${errorMessage}`, errorStack, 'EmailInboxController');
      throw new HttpException(
        ApiResponseUtil.error(`Insert failed: ${errorMessage}`),
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
  }

  /**
   * Newest emails first
   * GET /email-inbox?limit=20&offset=0
   */
  @Get()
  async findAll(@Query() query: PaginationQueryDto): Promise<EmailInboxRow[]> {
    try {
      return await this.emailInboxService.findAll({ limit: query.limit, offset: query.offset });
    } catch (error: unknown) {
      const errorMessage = ApiResponseUtil.messageOf(error);
      this.logger.error(`Error listing emails: ${errorMessage}`, undefined, 'EmailInboxController');
      throw new HttpException(ApiResponseUtil.error(errorMessage), HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }

  /**
   * GET /email-inbox/:id
   */
  @Get(':id')
  async findOne(
    @Param('id', createParseIdPipe()) id: number,
  ): Promise<EmailInboxRow> {
    try {
      return await this.emailInboxService.findOne(id);
    } catch (error: unknown) {
      const errorMessage = ApiResponseUtil.messageOf(error);
      if (error instanceof RecordNotFoundError) {
        throw new HttpException(ApiResponseUtil.error(errorMessage), HttpStatus.NOT_FOUND);
      }
      this.logger.error(`Error getting email ${id}: ${errorMessage}`, undefined, 'EmailInboxController');
      throw new HttpException(ApiResponseUtil.error(errorMessage), HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }
}
