import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { logConfig } from '../connections/config/logging.config';

interface CallerInfo {
  file?: string;
  line?: number;
  function?: string;
}

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private toFile: boolean;
  private silentConsole: boolean;

  constructor() {
    this.logLevel = logConfig.level;
    this.rotation = logConfig.rotation;
    this.retention = logConfig.retention;
    this.compression = logConfig.compression;
    this.logDir = logConfig.dir;
    this.toFile = logConfig.toFile;
    this.silentConsole = logConfig.silentConsole;

    if (this.toFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private getCallerInfo(): CallerInfo {
    const originalFunc = Error.prepareStackTrace;
    let frames: NodeJS.CallSite[] = [];

    try {
      Error.prepareStackTrace = (_err, stack) => {
        frames = stack;
        return '';
      };
      // Reading .stack is what runs prepareStackTrace
      void new Error().stack;
    } finally {
      Error.prepareStackTrace = originalFunc;
    }

    // Skip getCallerInfo itself and the winston format function
    for (const frame of frames.slice(2)) {
      const file = frame.getFileName();
      if (file && !file.includes('node_modules') && !file.includes('winston') && file !== __filename) {
        return {
          file,
          line: frame.getLineNumber() ?? undefined,
          function: frame.getFunctionName() || 'anonymous',
        };
      }
    }

    return {};
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackLabel: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const callerInfo = this.getCallerInfo();
    const location = callerInfo.file && callerInfo.line
      ? ` | ${callerInfo.file}:${callerInfo.line}${callerInfo.function ? ` (${callerInfo.function})` : ''}`
      : '';

    const stackStr = stack ? `\n${stackLabel}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${timestamp} | ${level} | ${message}${location}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
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

  private createRotatingFile(name: string, level: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.rotation,
      maxFiles: this.retention,
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

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
      silent: this.silentConsole,
    }));

    if (this.toFile) {
      logger.add(this.createRotatingFile('sys', this.logLevel));
      logger.add(this.createRotatingFile('error', 'error'));
      // combined keeps every level
      logger.add(this.createRotatingFile('combined', 'silly'));
    }

    return logger;
  }
}

const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}
