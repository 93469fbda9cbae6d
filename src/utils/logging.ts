import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig } from '../connections/config/app.config';

export interface RotationOptions {
  maxSize?: string;
  datePattern: string;
}

/**
 * LOG_ROTATION: kích thước ("10MB", "500KB") hoặc chu kỳ ("daily", "hourly")
 */
export const parseRotation = (rotation: string): RotationOptions => {
  const value = rotation.trim();
  if (/^\d+\s*(KB|MB|GB)$/i.test(value)) {
    return { maxSize: value.replace(/\s+/g, '').toLowerCase().replace(/b$/, ''), datePattern: 'YYYY-MM-DD' };
  }
  if (/hour/i.test(value)) {
    return { datePattern: 'YYYY-MM-DD-HH' };
  }
  if (/day|daily/i.test(value)) {
    return { datePattern: 'YYYY-MM-DD' };
  }
  return { maxSize: '10m', datePattern: 'YYYY-MM-DD' };
};

/**
 * LOG_RETENTION: "30 days" -> "30d", "12 hours" -> "12h"
 */
export const parseRetention = (retention: string): string => {
  const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)\b/i);
  if (match) {
    const unit = match[2].toLowerCase();
    return `${match[1]}${unit.startsWith('h') ? 'h' : 'd'}`;
  }
  return '30d';
};

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private fileLogging: boolean;

  constructor() {
    this.logLevel = appConfig.logLevel;
    this.rotation = appConfig.logRotation;
    this.retention = appConfig.logRetention;
    this.compression = true;
    this.logDir = appConfig.logDir;

    // Test runs chỉ log ra console, không tạo file
    this.fileLogging = appConfig.nodeEnv !== 'test';

    if (this.fileLogging && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = stack ? `\n${stackPrefix}${String(stack)}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => this.formatLine(info, 'Stack: '))
    );
  }

  private createFileTransport(name: string, level?: string): DailyRotateFile {
    const rotationConfig = parseRotation(this.rotation);
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: rotationConfig.datePattern,
      maxSize: rotationConfig.maxSize,
      maxFiles: parseRetention(this.retention),
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
      exitOnError: false,
    });

    // Console transport - with colors and nice formatting
    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
      silent: appConfig.nodeEnv === 'test',
    }));

    if (!this.fileLogging) {
      return logger;
    }

    logger.add(this.createFileTransport('sys'));
    logger.add(this.createFileTransport('error', 'error'));
    // combined lấy tất cả các level
    logger.add(this.createFileTransport('combined', 'silly'));

    return logger;
  }
}

const loggingConfig = new LoggingConfig();

// Setup logging when module is imported
export const logger = loggingConfig.setupLogging();

export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}
