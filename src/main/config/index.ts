/**
 * Configuration service for the application
 * Responsible for loading environment variables and providing typed access to them
 */
import * as dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../error/app.error';

type ValueType = 'string' | 'number' | 'boolean';

// Package root, the same from src/ and from dist/
const packageRoot = path.resolve(__dirname, '..', '..', '..');

const DEFAULT_DATA_FILE = 'locationData.json';

export class ConfigService {
  private config: Record<string, string | undefined> = {};

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.loadConfig(env);
  }

  private loadConfig(env: NodeJS.ProcessEnv): void {
    // Load environment variables from .env file
    if (env === process.env) {
      dotenv.config();
    }

    const dataDir = env.LOCATION_DATA_DIR || path.join(os.homedir(), 'Documents');

    this.config = {
      // Application configuration
      NODE_ENV: env.NODE_ENV || 'production',

      // Paths
      LOCATION_DATA_DIR: dataDir,
      LOCATION_DATA_FILE: env.LOCATION_DATA_FILE || DEFAULT_DATA_FILE,
      LOCATION_SEED_PATH: env.LOCATION_SEED_PATH || path.join(packageRoot, 'assets', DEFAULT_DATA_FILE),

      // Logging
      LOG_LEVEL: env.LOG_LEVEL || 'info',
      LOG_TO_CONSOLE: env.LOG_TO_CONSOLE || 'true',
      LOG_TO_FILE: env.LOG_TO_FILE || 'false',
      LOG_DIR: env.LOG_DIR || path.join(dataDir, 'logs'),
    };
  }

  // Generic getter with type conversion
  public get(key: string, type: 'string'): string | undefined;
  public get(key: string, type: 'number'): number | undefined;
  public get(key: string, type: 'boolean'): boolean | undefined;
  public get(key: string, type: ValueType = 'string'): string | number | boolean | undefined {
    const value = this.config[key];

    if (value === undefined || value === '') {
      return undefined;
    }

    switch (type) {
      case 'number': {
        const parsed = Number(value);
        if (Number.isNaN(parsed)) {
          throw new ConfigError(`Configuration value ${key} is not a number: "${value}"`);
        }
        return parsed;
      }
      case 'boolean':
        return value === 'true' || value === '1';
      case 'string':
      default:
        return value;
    }
  }

  // Get config value with default fallback
  public getOrDefault(key: string, defaultValue: string): string;
  public getOrDefault(key: string, defaultValue: number): number;
  public getOrDefault(key: string, defaultValue: boolean): boolean;
  public getOrDefault(key: string, defaultValue: string | number | boolean): string | number | boolean {
    let value: string | number | boolean | undefined;
    if (typeof defaultValue === 'number') {
      value = this.get(key, 'number');
    } else if (typeof defaultValue === 'boolean') {
      value = this.get(key, 'boolean');
    } else {
      value = this.get(key, 'string');
    }
    return value !== undefined ? value : defaultValue;
  }

  // Type-specific getters
  public getString(key: string): string | undefined {
    return this.get(key, 'string');
  }

  public getNumber(key: string): number | undefined {
    return this.get(key, 'number');
  }

  public getBoolean(key: string): boolean | undefined {
    return this.get(key, 'boolean');
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
  public getDataDir(): string {
    return this.getRequiredString('LOCATION_DATA_DIR');
  }

  public getDataPath(): string {
    return path.join(this.getDataDir(), this.getOrDefault('LOCATION_DATA_FILE', DEFAULT_DATA_FILE));
  }

  public getSeedPath(): string {
    return this.getRequiredString('LOCATION_SEED_PATH');
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
