/**
 * Logger Service for the Email Inbox API
 * Appends every line to <level>.log and all.log under the configured log directory.
 */

import { Inject, Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { LogLevel, LoggingConfig, loggingConfig } from '../../src/config/configuration';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

@Injectable()
export class LoggerService implements NestLoggerService {
  private readonly logDir: string;

  constructor(
    @Inject(loggingConfig.KEY)
    private readonly config: LoggingConfig,
  ) {
    this.logDir = config.dir;
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private writeLog(level: LogLevel, message: string, context?: string) {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.config.level]) {
      return;
    }
    const logLine = `[${new Date().toISOString()}] [${level.toUpperCase()}]${context ? ` [${context}]` : ''} ${message}\n`;

    fs.appendFileSync(path.join(this.logDir, `${level}.log`), logLine, 'utf8');
    fs.appendFileSync(path.join(this.logDir, 'all.log'), logLine, 'utf8');

    if (this.config.console) {
      process.stdout.write(logLine);
    }
  }

  log(message: string, context?: string) {
    this.writeLog('info', message, context);
  }

  error(message: string, trace?: string, context?: string) {
    this.writeLog('error', `${message}${trace ? `\n${trace}` : ''}`, context);
  }

  warn(message: string, context?: string) {
    this.writeLog('warn', message, context);
  }

  debug(message: string, context?: string) {
    this.writeLog('debug', message, context);
  }

  verbose(message: string, context?: string) {
    this.debug(message, context);
  }
}
