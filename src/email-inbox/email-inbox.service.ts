/**
 * Email Inbox Service
 * Reads and writes the email_inbox table, one connection per call.
 */

import { Inject, Injectable } from '@nestjs/common';
import { ConnectionProvider } from '../../shared/database/connection.provider';
import { Page } from '../../shared/dto/pagination-query.dto';
import { RecordNotFoundError } from '../../shared/errors/database.errors';
import { LoggerService } from '../../shared/logger/logger.service';
import { CreateEmailInboxDto } from './dto/create-email-inbox.dto';
import { EmailInboxRow } from './email-inbox.types';

export const EMAIL_INBOX_TABLE = 'email_inbox';

const INSERT_COLUMNS = [
  'message_id',
  'internet_message_id',
  'from_name',
  'from_email',
  'to_email',
  'subject',
  'body_preview',
  'body_html',
  'received_at',
  'channel',
  'processing_status',
  'linked_case_id',
  'raw_payload',
] as const;

@Injectable()
export class EmailInboxService {
  constructor(
    private connectionProvider: ConnectionProvider,
    @Inject(LoggerService)
    private logger: LoggerService,
  ) {}

  async insert(dto: CreateEmailInboxDto): Promise<EmailInboxRow> {
    const placeholders = INSERT_COLUMNS.map((_, index) => `$${index + 1}`).join(', ');
    const sql =
      `INSERT INTO ${this.connectionProvider.table(EMAIL_INBOX_TABLE)} (${INSERT_COLUMNS.join(', ')}) ` +
      `VALUES (${placeholders}) RETURNING *`;
    const parameters = [
      dto.message_id ?? null,
      dto.internet_message_id ?? null,
      dto.from_name ?? null,
      dto.from_email,
      dto.to_email,
      dto.subject ?? null,
      dto.body_preview ?? null,
      dto.body_html ?? null,
      dto.received_at ?? null,
      dto.channel ?? null,
      dto.processing_status ?? null,
      dto.linked_case_id ?? null,
      dto.raw_payload == null ? null : JSON.stringify(dto.raw_payload),
    ];

    const rows = await this.connectionProvider.withConnection((connection) =>
      connection.query<EmailInboxRow[]>(sql, parameters),
    );
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT returned no row');
    }

    this.logger.log(`Inserted email ${row.email_id} from ${row.from_email}`, 'EmailInboxService');
    return row;
  }

  async findAll(page: Page): Promise<EmailInboxRow[]> {
    const sql =
      `SELECT * FROM ${this.connectionProvider.table(EMAIL_INBOX_TABLE)} ` +
      `ORDER BY received_at DESC LIMIT $1 OFFSET $2`;
    return this.connectionProvider.withConnection((connection) =>
      connection.query<EmailInboxRow[]>(sql, [page.limit, page.offset]),
    );
  }

  async findOne(id: number): Promise<EmailInboxRow> {
    const sql = `SELECT * FROM ${this.connectionProvider.table(EMAIL_INBOX_TABLE)} WHERE email_id = $1`;
    const rows = await this.connectionProvider.withConnection((connection) =>
      connection.query<EmailInboxRow[]>(sql, [id]),
    );
    if (rows.length === 0) {
      throw new RecordNotFoundError('Email not found');
    }
    return rows[0];
  }
}
