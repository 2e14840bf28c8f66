import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { loggingConfig as settings } from '../connections/config/app.config';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

class LoggingConfig {
  private logLevel: string;
  private silent: boolean;
  private maxSize: string;
  private maxFiles: string;
  private compression: boolean;
  private logDir: string;

  constructor(level: string, logDir: string) {
    this.silent = level === 'silent';
    this.logLevel = LEVELS.includes(level) ? level : 'info';
    this.maxSize = '10m';
    this.maxFiles = '30d';
    this.compression = true;
    this.logDir = path.resolve(logDir);
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackLabel: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = typeof stack === 'string' ? `\n${stackLabel}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf(info => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(info => this.formatLine(info, 'Stack: '))
    );
  }

  private createFileTransport(name: string, level: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.maxSize,
      maxFiles: this.maxFiles,
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: [],
      silent: this.silent,
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
    }));

    // No files in silent mode (tests)
    if (this.silent) {
      return logger;
    }

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    logger.add(this.createFileTransport('sys', this.logLevel));
    logger.add(this.createFileTransport('error', 'error'));
    logger.add(this.createFileTransport('combined', 'silly'));

    return logger;
  }
}

export const loggingConfig = new LoggingConfig(settings.level, settings.dir);

export const logger = loggingConfig.setupLogging();

export { LoggingConfig };

/**
 * Security-relevant events (signup, verification, password changes, token reuse)
 */
export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
