/**
 * Logger service for structured logging using Winston
 * Provides consistent logging across the application while maintaining
 * flexibility and consistency in log levels, transports, and formatting.
 */
import * as path from 'path';
import * as fs from 'fs';
import winston from 'winston';
import configService from '../config';
import type { ConfigService } from '../config';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

// npm levels, lower is more severe
const winstonLevels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  verbose: 3,
  debug: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in winstonLevels;
}

export class Logger {
  private winstonLogger: winston.Logger;
  private currentLevel: LogLevel;
  private logFilePath: string | null = null;
  private consoleEnabled: boolean;
  private fileEnabled: boolean;
  private moduleLoggers: Map<string, LoggerInstance> = new Map();
  private readonly config: ConfigService;

  constructor(config: ConfigService = configService) {
    this.config = config;
    const configuredLevel = config.getString('LOG_LEVEL');
    this.currentLevel = isLogLevel(configuredLevel) ? configuredLevel : 'info';
    this.consoleEnabled = config.getOrDefault('LOG_TO_CONSOLE', true);
    this.fileEnabled = config.getOrDefault('LOG_TO_FILE', false);

    this.winstonLogger = winston.createLogger({
      levels: winstonLevels,
      level: this.currentLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
      ),
      transports: [],
      exitOnError: false,
    });

    if (this.fileEnabled) {
      this.setupLogFile();
    }

    this.reconfigureTransports();
  }

  private setupLogFile(): void {
    if (this.logFilePath) return;

    try {
      const logsDir = this.config.getLogDir();

      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      const now = new Date();
      const fileName = `app-${now.getFullYear()}-${(now.getMonth() + 1).toString().padStart(2, '0')}-${now.getDate().toString().padStart(2, '0')}.log`;
      this.logFilePath = path.join(logsDir, fileName);
    } catch (error) {
      console.error('src/main/logging/logger.ts: Failed to set up log file path:', error);
      this.fileEnabled = false;
      this.logFilePath = null;
    }
  }

  // Rebuild Winston transports from the current settings
  private reconfigureTransports(): void {
    this.winstonLogger.clear();

    if (this.consoleEnabled) {
      this.winstonLogger.add(new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, timestamp, module, data, stack }) => {
            const dataString = data !== undefined ? ` ${JSON.stringify(data)}` : '';
            const moduleString = typeof module === 'string' ? ` [${module}]` : '';
            const logMessage = `[${String(timestamp)}] [${level}]${moduleString} ${String(message)}${dataString}`;
            return typeof stack === 'string' ? `${logMessage}\n${stack}` : logMessage;
          })
        ),
        level: this.currentLevel,
      }));
    }

    if (this.fileEnabled && this.logFilePath) {
      this.winstonLogger.add(new winston.transports.File({
        filename: this.logFilePath,
        format: winston.format.json(),
        level: this.currentLevel,
      }));
    }

    // Winston complains about writes with no transports attached
    this.winstonLogger.silent = this.winstonLogger.transports.length === 0;
  }

  // Get a cached child logger instance for a specific module
  public getLogger(module: string): LoggerInstance {
    let instance = this.moduleLoggers.get(module);
    if (!instance) {
      instance = new LoggerInstance(this, module);
      this.moduleLoggers.set(module, instance);
    }
    return instance;
  }

  /**
   * Dated log file in use, or null when file logging is off
   */
  public getLogFilePath(): string | null {
    return this.logFilePath;
  }

  public log(level: LogLevel, module: string, message: string, data?: unknown): void {
    this.winstonLogger.log(level, message, { module, data: serializeData(data) });
  }

}

// Errors do not survive JSON.stringify, flatten them first
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }
  return data;
}

// Logger instance for a specific module
export class LoggerInstance {
  private logger: Logger;
  private module: string;

  constructor(logger: Logger, module: string) {
    this.logger = logger;
    this.module = module;
  }

  public error(message: string, data?: unknown): void {
    this.logger.log('error', this.module, message, data);
  }

  public warn(message: string, data?: unknown): void {
    this.logger.log('warn', this.module, message, data);
  }

  public info(message: string, data?: unknown): void {
    this.logger.log('info', this.module, message, data);
  }

  public debug(message: string, data?: unknown): void {
    this.logger.log('debug', this.module, message, data);
  }
}

/**
 * Singleton root logger. Configure levels and transports here;
 * modules get their own tagged instance through getLogger().
 */
export const rootLogger = new Logger();
export default rootLogger;
