/**
 * Configuration namespaces
 * Read from the environment once, when ConfigModule loads them at startup.
 */

import { ConfigType, registerAs } from '@nestjs/config';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export const databaseConfig = registerAs('database', () =>
  Object.freeze({
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    name: process.env.DB_NAME || 'postgres',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || '',
    // Schema holding email_inbox, cases, ai_decisions and risk_events
    schema: process.env.DB_SCHEMA || 'Puma_L1_AI',
    logging: process.env.NODE_ENV === 'development',
  }),
);

export const httpConfig = registerAs('http', () =>
  Object.freeze({
    port: parseInt(process.env.PORT || '8000', 10),
    corsOrigin: process.env.CORS_ORIGIN || '*',
  }),
);

export const loggingConfig = registerAs('logging', () => {
  const requested = (process.env.LOG_LEVEL || 'info').toLowerCase();
  const level: LogLevel = isLogLevel(requested) ? requested : 'info';
  return Object.freeze({
    dir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
    level,
    console: process.env.NODE_ENV === 'development' || process.env.LOG_CONSOLE === 'true',
  });
});

export type DatabaseConfig = ConfigType<typeof databaseConfig>;
export type HttpConfig = ConfigType<typeof httpConfig>;
export type LoggingConfig = ConfigType<typeof loggingConfig>;
