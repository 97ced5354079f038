/**
 * Logger service for structured logging using Winston
 * Provides consistent logging across the application while maintaining
 * flexibility and consistency in log levels, transports, and formatting.
 */
import * as path from 'path';
import * as fs from 'fs';
import winston from 'winston';
import configService, { LogLevel } from '../config';

// Define Winston log levels (aligns with npm levels)
const winstonLevels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  verbose: 3,
  debug: 4,
};

// Every level goes to stderr; stdout belongs to the menu
const STDERR_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug'];

// Errors serialize to {} through JSON, so flatten them first
function toLogData(data: unknown): unknown {
  if (data instanceof Error) {
    const code = 'code' in data ? data.code : undefined;
    return { name: data.name, message: data.message, code, stack: data.stack };
  }
  return data;
}

export class Logger {
  private winstonLogger: winston.Logger;
  private currentLevel: LogLevel;
  private logDir: string;
  private logFilePath: string | null = null;
  private consoleEnabled: boolean = true;
  private fileEnabled: boolean = false;
  private moduleLoggers: Map<string, LoggerInstance> = new Map(); // Cache module loggers

  constructor() {
    this.currentLevel = configService.getLogLevel();
    this.consoleEnabled = configService.getOrDefault('LOG_TO_CONSOLE', true);
    this.fileEnabled = configService.getOrDefault('LOG_TO_FILE', false);
    this.logDir = configService.getLogDir();

    this.winstonLogger = winston.createLogger({
      levels: winstonLevels,
      level: this.currentLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }), // Log stack traces for errors
        winston.format.splat(),
        winston.format.json() // Log in JSON format to file
      ),
      transports: [], // Transports will be added dynamically
      exitOnError: false,
    });

    if (this.fileEnabled) {
      this.setupLogFile();
    }

    this.reconfigureTransports();
  }

  private setupLogFile(): void {
    if (this.logFilePath) return; // Already set up

    try {
      if (!fs.existsSync(this.logDir)) {
        fs.mkdirSync(this.logDir, { recursive: true });
      }

      // Create a log file name with current date
      const now = new Date();
      const fileName = `app-${now.getFullYear()}-${(now.getMonth() + 1).toString().padStart(2, '0')}-${now.getDate().toString().padStart(2, '0')}.log`;
      this.logFilePath = path.join(this.logDir, fileName);
    } catch (error) {
      // Logging is not up yet, so this one goes straight to stderr
      console.error('src/main/logging/logger.ts: Failed to set up log file path:', error);
      this.fileEnabled = false;
      this.logFilePath = null;
    }
  }

  // Reconfigure Winston transports based on current settings
  private reconfigureTransports(): void {
    this.winstonLogger.clear(); // Remove existing transports

    if (this.consoleEnabled) {
      this.winstonLogger.add(new winston.transports.Console({
        stderrLevels: STDERR_LEVELS,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, timestamp, module, data, stack }) => {
            const dataString = data ? ` ${JSON.stringify(data)}` : '';
            const moduleString = module ? ` [${module}]` : '';
            const logMessage = `[${timestamp}] [${level}]${moduleString} ${message}${dataString}`;
            return stack ? `${logMessage}\n${stack}` : logMessage;
          })
        ),
        level: this.currentLevel,
      }));
    }

    if (this.fileEnabled && this.logFilePath) {
      this.winstonLogger.add(new winston.transports.File({
        filename: this.logFilePath,
        format: winston.format.json(), // Keep file logs as JSON
        level: this.currentLevel,
      }));
    }

    // Winston complains on every write when it has nowhere to send it
    if (this.winstonLogger.transports.length === 0) {
      this.winstonLogger.add(new winston.transports.Console({ silent: true }));
    }
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

  // Log a message using Winston, with module and data as metadata
  public log(level: LogLevel, module: string, message: string, data?: unknown): void {
    this.winstonLogger.log(level, message, { module, data: toLogData(data) });
  }

  // Set the current log level for all transports
  public setLevel(level: LogLevel): void {
    this.currentLevel = level;
    this.winstonLogger.level = level;
    this.winstonLogger.transports.forEach(transport => {
      transport.level = level;
    });
  }

  public getLevel(): LogLevel {
    return this.currentLevel;
  }

  // Enable or disable console logging
  public enableConsole(enabled: boolean): void {
    if (this.consoleEnabled !== enabled) {
      this.consoleEnabled = enabled;
      this.reconfigureTransports();
    }
  }

  // Enable or disable file logging
  public enableFile(enabled: boolean): void {
    if (this.fileEnabled !== enabled) {
      this.fileEnabled = enabled;
      if (enabled) {
        this.setupLogFile(); // Ensure path is set before reconfiguring
      }
      this.reconfigureTransports();
    }
  }
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

  public verbose(message: string, data?: unknown): void {
    this.logger.log('verbose', this.module, message, data);
  }
}

/**
 * Singleton instance of the main Logger.
 * Central point for configuring and accessing logging throughout the application.
 */
export const rootLogger = new Logger();
export default rootLogger;
