/**
 * Connection Provider
 * Opens one unpooled PostgreSQL connection per unit of work and always closes it afterwards.
 */

import { Inject, Injectable } from '@nestjs/common';
import { DataSource, DataSourceOptions } from 'typeorm';
import { DatabaseConfig, databaseConfig } from '../../src/config/configuration';
import { ConnectionError } from '../errors/database.errors';
import { LoggerService } from '../logger/logger.service';
import { ApiResponseUtil } from '../utils/api-response.util';

export type SqlRow = Record<string, unknown>;

export interface QueryExecutor {
  query<T = SqlRow[]>(sql: string, parameters?: unknown[]): Promise<T>;
}

/** The part of a TypeORM DataSource the provider drives. */
export interface ManagedConnection extends QueryExecutor {
  readonly isInitialized: boolean;
  initialize(): Promise<unknown>;
  destroy(): Promise<void>;
}

export type DataSourceFactory = (options: DataSourceOptions) => ManagedConnection;

export const DATA_SOURCE_FACTORY = Symbol('DATA_SOURCE_FACTORY');

export const createDataSource: DataSourceFactory = (options) => new DataSource(options);

@Injectable()
export class ConnectionProvider {
  constructor(
    @Inject(databaseConfig.KEY)
    private readonly config: DatabaseConfig,
    @Inject(DATA_SOURCE_FACTORY)
    private readonly dataSourceFactory: DataSourceFactory,
    @Inject(LoggerService)
    private readonly logger: LoggerService,
  ) {}

  /**
   * Schema-qualified, quoted name of a table in the configured schema.
   */
  table(name: string): string {
    return `${quoteIdentifier(this.config.schema)}.${quoteIdentifier(name)}`;
  }

  async withConnection<T>(work: (connection: QueryExecutor) => Promise<T>): Promise<T> {
    const connection = this.dataSourceFactory({
      type: 'postgres',
      host: this.config.host,
      port: this.config.port,
      database: this.config.name,
      username: this.config.user,
      password: this.config.password,
      entities: [],
      synchronize: false,
      logging: this.config.logging,
      extra: { max: 1 },
    });

    try {
      await connection.initialize();
    } catch (error: unknown) {
      const message = ApiResponseUtil.messageOf(error);
      this.logger.error(
        `Could not connect to ${this.config.host}:${this.config.port}/${this.config.name}: ${message}`,
        undefined,
        'ConnectionProvider',
      );
      throw new ConnectionError(message);
    }

    try {
      return await work(connection);
    } finally {
      await this.release(connection);
    }
  }

  private async release(connection: ManagedConnection): Promise<void> {
    if (!connection.isInitialized) {
      return;
    }
    try {
      await connection.destroy();
    } catch (error: unknown) {
      // Keep the outcome of the work itself; a failed close only gets logged
      this.logger.warn(`Failed to close connection: ${ApiResponseUtil.messageOf(error)}`, 'ConnectionProvider');
    }
  }
}

export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}
