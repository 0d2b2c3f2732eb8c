import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { logConfig } from '../connections/config/app.config';

interface LoggingOptions {
  level: string;
  dir: string;
  toFile: boolean;
  silentConsole: boolean;
  maxSize: string;
  retention: string;
  zippedArchive: boolean;
}

class LoggingConfig {
  private readonly options: LoggingOptions;
  private readonly logDir: string;

  constructor(options: LoggingOptions) {
    this.options = options;
    this.logDir = path.resolve(options.dir);

    if (options.toFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = typeof stack === 'string' ? `\n${stackPrefix}${stack}` : '';
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

  private createRotatingFile(name: string, level?: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.options.maxSize,
      maxFiles: this.options.retention,
      zippedArchive: this.options.zippedArchive,
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
      silent: this.options.silentConsole,
      format: this.createConsoleFormat(),
    }));

    if (this.options.toFile) {
      logger.add(this.createRotatingFile('combined', 'silly'));
      logger.add(this.createRotatingFile('error', 'error'));
    }

    return logger;
  }
}

export const loggingConfig = new LoggingConfig(logConfig);

export const logger = loggingConfig.setupLogging();

/**
 * Logger tagged with the component name, e.g. `getLogger('catalog')`.
 */
export function getLogger(name: string): winston.Logger {
  return logger.child({ name });
}

export { LoggingConfig };
