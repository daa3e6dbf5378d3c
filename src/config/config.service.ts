import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable } from '@nestjs/common';
import { Logger } from '../common/interceptors/logging.interceptor';

@Injectable()
export class ConfigService {
  private readonly envConfig: Record<string, string>;

  constructor() {
    const nodeEnv = process.env.NODE_ENV || 'development';
    const envFile = `.env.${nodeEnv}`;

    let fileConfig: Record<string, string> = {};
    try {
      fileConfig = dotenv.parse(fs.readFileSync(envFile));
    } catch (err) {
      Logger.warn(`Failed to load ${envFile}, using process.env`, 'ConfigService');
    }

    // Values exported in the process environment win over the env file
    const processConfig = Object.fromEntries(
      Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined),
    );
    this.envConfig = { ...fileConfig, ...processConfig };
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getOrDefault(key: string, fallback: string): string {
    return this.envConfig[key] ?? fallback;
  }

  getNumber(key: string, fallback: number): number {
    const raw = this.envConfig[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  }

  get isProduction(): boolean {
    return this.getOrDefault('NODE_ENV', 'development') === 'production';
  }
}
