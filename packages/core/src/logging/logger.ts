/**
 * Structured logging on top of Winston.
 *
 * One root logger owns the transports; modules ask for a cached child through
 * `getLogger('TaskService')` so every line carries the module it came from.
 */
import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export interface LoggingOptions {
  /** 'silent' turns every transport off (tests) */
  level: LogLevel | 'silent';
  console: boolean;
  file: boolean;
  dir: string;
}

const winstonLevels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  verbose: 3,
  debug: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in winstonLevels;
}

export function loggingOptionsFromEnv(env: NodeJS.ProcessEnv): LoggingOptions {
  const raw = (env['LOG_LEVEL'] ?? 'info').toLowerCase();
  return {
    level: raw === 'silent' || isLogLevel(raw) ? raw : 'info',
    console: env['LOG_TO_CONSOLE'] !== 'false',
    file: env['LOG_TO_FILE'] === 'true',
    dir: env['LOG_DIR'] ?? 'logs',
  };
}

export class Logger {
  private readonly winstonLogger: winston.Logger;
  private options: LoggingOptions;
  private readonly moduleLoggers = new Map<string, ModuleLogger>();

  constructor(options: LoggingOptions) {
    this.options = options;
    this.winstonLogger = winston.createLogger({
      levels: winstonLevels,
      level: options.level === 'silent' ? 'error' : options.level,
      silent: options.level === 'silent',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json(),
      ),
      transports: [],
      exitOnError: false,
    });
    this.reconfigureTransports();
  }

  /** Apply new options (level, transports) to every module logger at once */
  configure(options: Partial<LoggingOptions>): void {
    this.options = { ...this.options, ...options };
    const silent = this.options.level === 'silent';
    this.winstonLogger.silent = silent;
    this.winstonLogger.level = silent ? 'error' : this.options.level;
    this.reconfigureTransports();
  }

  get level(): LogLevel | 'silent' {
    return this.options.level;
  }

  private reconfigureTransports(): void {
    this.winstonLogger.clear();
    const level = this.options.level === 'silent' ? 'error' : this.options.level;

    if (this.options.console) {
      this.winstonLogger.add(new winston.transports.Console({
        level,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level: lvl, message, timestamp, module, data, stack }) => {
            const dataString = data !== undefined ? ` ${JSON.stringify(data)}` : '';
            const moduleString = typeof module === 'string' ? ` [${module}]` : '';
            const line = `[${String(timestamp)}] [${lvl}]${moduleString} ${String(message)}${dataString}`;
            return typeof stack === 'string' ? `${line}\n${stack}` : line;
          }),
        ),
      }));
    }

    if (this.options.file) {
      mkdirSync(this.options.dir, { recursive: true });
      this.winstonLogger.add(new winston.transports.File({
        level,
        filename: join(this.options.dir, 'app.log'),
        maxsize: 10 * 1024 * 1024,
        maxFiles: 10,
        format: winston.format.json(),
      }));
    }
  }

  getLogger(module: string): ModuleLogger {
    let logger = this.moduleLoggers.get(module);
    if (!logger) {
      logger = new ModuleLogger(this, module);
      this.moduleLoggers.set(module, logger);
    }
    return logger;
  }

  log(level: LogLevel, module: string, message: string, data?: unknown): void {
    if (data instanceof Error) {
      this.winstonLogger.log(level, message, { module, data: { message: data.message }, stack: data.stack });
      return;
    }
    this.winstonLogger.log(level, message, { module, data });
  }
}

export class ModuleLogger {
  constructor(
    private readonly logger: Logger,
    readonly module: string,
  ) {}

  error(message: string, data?: unknown): void {
    this.logger.log('error', this.module, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.log('warn', this.module, message, data);
  }

  info(message: string, data?: unknown): void {
    this.logger.log('info', this.module, message, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.log('verbose', this.module, message, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.log('debug', this.module, message, data);
  }
}

export const rootLogger = new Logger(loggingOptionsFromEnv(process.env));
export default rootLogger;
