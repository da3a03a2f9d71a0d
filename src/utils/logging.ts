import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { logConfig } from '../connections/config/app.config';

interface LoggingOptions {
  level: string;
  dir: string;
  toFile: boolean;
  rotation: string;
  retention: string;
  compression: boolean;
}

class LoggingConfig {
  private readonly options: LoggingOptions;
  private readonly logDir: string;

  constructor(options: Partial<LoggingOptions> = {}) {
    this.options = {
      level: logConfig.level,
      dir: logConfig.dir,
      toFile: logConfig.toFile,
      rotation: '10MB',
      retention: '30d',
      compression: true,
      ...options,
    };

    this.logDir = this.options.dir
      ? path.resolve(this.options.dir)
      : path.join(process.cwd(), 'logs');

    if (this.options.toFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackLabel: string): string {
    const { timestamp, level, message, stack, name, ...meta } = info;
    const scope = typeof name === 'string' ? ` | ${name}` : '';
    const stackStr = typeof stack === 'string' ? `\n${stackLabel}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level}${scope} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
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

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const [, num, unit] = match;
      if (unit.toLowerCase().startsWith('d')) return `${num}d`;
      if (unit.toLowerCase().startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createFileTransport(prefix: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.options.rotation);
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${prefix}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.options.retention),
      zippedArchive: this.options.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.options.level,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.options.level,
      format: this.createConsoleFormat(),
      silent: process.env.NODE_ENV === 'test',
    }));

    if (this.options.toFile) {
      logger.add(this.createFileTransport('combined', 'silly'));
      logger.add(this.createFileTransport('error', 'error'));
    }

    return logger;
  }
}

const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

/**
 * Scoped child logger, tags every line with the component name
 */
export const getLogger = (name: string): winston.Logger => logger.child({ name });

