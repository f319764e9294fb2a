import { Injectable, LoggerService, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import 'winston-daily-rotate-file';
import * as fs from 'fs';
import * as path from 'path';
import { ILoggerPort, LogLevel, LogContext } from './logger.port';
import { RequestContextService } from './request-context.service';
import { computeCallSite } from './utils/callsite.util';
import { makePrettyConsoleFormat, makeJsonFileFormat } from './winston-logger.formatters';

type WinstonLevel = 'debug' | 'info' | 'warn' | 'error' | 'verbose';

@Injectable()
export class WinstonLoggerAdapter implements ILoggerPort, LoggerService {
  private readonly logger: winston.Logger;
  private static handlersInstalled = false;

  constructor(
    private readonly configService: ConfigService,
    @Optional() private readonly requestContext?: RequestContextService
  ) {
    const logLevel = this.configService.get<string>('LOG_LEVEL', 'info');
    const logDir = this.configService.get<string>('LOG_DIR', 'logs');
    const appName = this.configService.get<string>('APP_NAME', 'resume-tailor');
    const enableConsole = this.configService.get<string>('LOG_ENABLE_CONSOLE', 'true') === 'true';
    let enableFiles = this.configService.get<string>('LOG_ENABLE_FILES', 'true') === 'true';

    if (enableFiles) {
      try {
        const absDir = path.isAbsolute(logDir) ? logDir : path.join(process.cwd(), logDir);
        if (!fs.existsSync(absDir)) {
          fs.mkdirSync(absDir, { recursive: true });
        }
      } catch (e) {
        enableFiles = false;
        process.stderr.write(`log directory ${logDir} is not writable, file logging off: ${e}\n`);
      }
    }

    const consoleTransport = new winston.transports.Console({
      level: logLevel,
      format: makePrettyConsoleFormat(this.requestContext),
      silent: !enableConsole,
    });

    const jsonFormat = makeJsonFileFormat(this.requestContext);

    const rotateFile = (filename: string, level?: string) =>
      new winston.transports.DailyRotateFile({
        dirname: logDir,
        filename: `${appName}-%DATE%-${filename}.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: this.configService.get<string>('LOG_MAX_SIZE', '20m'),
        maxFiles: this.configService.get<string>('LOG_MAX_FILES', '14d'),
        level: level || logLevel,
        format: jsonFormat,
        silent: !enableFiles,
      });

    const installHandlers = enableFiles && !WinstonLoggerAdapter.handlersInstalled;
    this.logger = winston.createLogger({
      level: logLevel,
      transports: [consoleTransport, rotateFile('combined'), rotateFile('error', 'error')],
      exceptionHandlers: installHandlers ? [rotateFile('exceptions', 'error')] : [],
      rejectionHandlers: installHandlers ? [rotateFile('rejections', 'error')] : [],
      exitOnError: false,
    });

    if (installHandlers) WinstonLoggerAdapter.handlersInstalled = true;
  }

  private buildMeta(
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>
  ): Record<string, unknown> {
    const callsite = computeCallSite(
      this.write,
      typeof context === 'string' ? context : undefined
    );

    let logContext: LogContext = { ...(this.requestContext?.getStore() ?? {}) };
    if (typeof context === 'object') logContext = { ...logContext, ...context };
    else if (typeof context === 'string') logContext.context = context;

    const meta: Record<string, unknown> = {
      ...metadata,
      ...callsite,
    };
    if (Object.keys(logContext).length > 0) {
      meta.context =
        typeof context === 'string' && Object.keys(logContext).length === 1
          ? context
          : safeStringify(logContext);
    }

    if (error instanceof Error) {
      meta.trace = error.stack;
      meta.error = { name: error.name, message: error.message, stack: error.stack };
      if ('code' in error && typeof error.code === 'string') {
        meta.errorCode = error.code;
      }
    } else if (error !== undefined) {
      meta.error = error;
    }
    return meta;
  }

  private write(
    level: WinstonLevel,
    message: string,
    error: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>
  ): void {
    this.logger[level](message, this.buildMeta(error, context, metadata));
  }

  log(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.write('info', message, undefined, context, metadata);
  }

  info(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.write('info', message, undefined, context, metadata);
  }

  debug(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.write('debug', message, undefined, context, metadata);
  }

  warn(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.write('warn', message, undefined, context, metadata);
  }

  error(
    message: string,
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>
  ): void {
    this.write('error', message, error, context, metadata);
  }

  fatal(
    message: string,
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>
  ): void {
    this.write('error', message, error, context, { ...metadata, fatal: true });
  }

  verbose(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.write('verbose', message, undefined, context, metadata);
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level === 'fatal' ? 'error' : level;
  }

  getLevel(): string {
    return this.logger.level;
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return '[Unserializable Context]';
  }
}
