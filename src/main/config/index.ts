/**
 * Configuration service for the application
 * Responsible for loading environment variables and providing typed access to them
 */
import * as dotenv from 'dotenv';
import * as path from 'path';
import { ConfigError } from '../error/app.error';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class ConfigService {
  private config: Record<string, string | undefined> = {};

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.loadConfig(env);
  }

  private loadConfig(env: NodeJS.ProcessEnv): void {
    // Load environment variables from .env file (never overrides what is already set)
    if (env === process.env) {
      dotenv.config();
    }

    // Set default values and use environment variables if available
    this.config = {
      // Persistence
      TASKS_FILE: env.TASKS_FILE || 'tasks.csv',

      // Logging
      LOG_LEVEL: env.LOG_LEVEL || 'warn',
      LOG_TO_CONSOLE: env.LOG_TO_CONSOLE,
      LOG_TO_FILE: env.LOG_TO_FILE,
      LOG_DIR: env.LOG_DIR || path.join(process.cwd(), 'logs'),

      // Application configuration
      NODE_ENV: env.NODE_ENV || 'production',
    };
  }

  // Type-specific getters
  public getString(key: string): string | undefined {
    return this.config[key];
  }

  public getBoolean(key: string): boolean | undefined {
    const value = this.config[key];
    if (value === undefined) {
      return undefined;
    }
    return value === 'true' || value === '1';
  }

  // Get config value with default fallback, typed by the default
  public getOrDefault(key: string, defaultValue: string): string;
  public getOrDefault(key: string, defaultValue: boolean): boolean;
  public getOrDefault(key: string, defaultValue: string | boolean): string | boolean {
    if (typeof defaultValue === 'boolean') {
      return this.getBoolean(key) ?? defaultValue;
    }
    return this.getString(key) ?? defaultValue;
  }

  // Required getter that throws if value is missing
  public getRequiredString(key: string): string {
    const value = this.getString(key);
    if (value === undefined) {
      throw new ConfigError(`Required configuration value not found: ${key}`);
    }
    return value;
  }

  // Convenience methods for commonly used configs
  public getTasksFilePath(): string {
    return this.getRequiredString('TASKS_FILE');
  }

  public getLogLevel(): LogLevel {
    const level = this.getOrDefault('LOG_LEVEL', 'warn');
    if (!isLogLevel(level)) {
      throw new ConfigError(`Unknown log level: "${level}"`);
    }
    return level;
  }

  public getLogDir(): string {
    return this.getRequiredString('LOG_DIR');
  }

  public isDevMode(): boolean {
    return this.getOrDefault('NODE_ENV', 'production') === 'development';
  }
}

// Export as singleton
export const configService = new ConfigService();
export default configService;
