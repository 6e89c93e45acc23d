/**
 * Records Service
 * Read-only, newest-first pages over the tables this service does not own.
 */

import { Injectable } from '@nestjs/common';
import { ConnectionProvider, SqlRow } from '../../shared/database/connection.provider';
import { Page } from '../../shared/dto/pagination-query.dto';

export type RecordTable = 'cases' | 'ai_decisions' | 'risk_events';

@Injectable()
export class RecordsService {
  constructor(private connectionProvider: ConnectionProvider) {}

  async listRecent(table: RecordTable, page: Page): Promise<SqlRow[]> {
    const sql =
      `SELECT * FROM ${this.connectionProvider.table(table)} ` +
      `ORDER BY created_at DESC LIMIT $1 OFFSET $2`;
    return this.connectionProvider.withConnection((connection) =>
      connection.query<SqlRow[]>(sql, [page.limit, page.offset]),
    );
  }
}
