/**
 * Configuration Manager for exchange credentials, logging and strategy timing
 * Defaults are overridden by a .env file, which is overridden by the process environment
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { LogLevel } from '../utils/logger';

export interface ExchangeSettings {
  apiKey: string;
  secretKey: string;
  testnet: boolean;
  /** Overrides the testnet/live endpoint */
  baseUrl?: string;
  recvWindowMs: number;
  requestTimeoutMs: number;
}

export interface LoggingSettings {
  level: LogLevel;
  file: string;
}

export interface StrategySettings {
  gridPollIntervalMs: number;
  ocoPollIntervalMs: number;
}

export interface BotConfig {
  exchange: ExchangeSettings;
  logging: LoggingSettings;
  strategies: StrategySettings;
}

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export type EnvironmentVariables = Record<string, string | undefined>;

export interface ConfigurationSource {
  /** Path of the .env file; false skips it */
  envFile?: string | false;
  env?: EnvironmentVariables;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

export class ConfigurationManager {
  private config: BotConfig;
  private readonly envFile: string | false;
  private readonly env: EnvironmentVariables;

  constructor(source: ConfigurationSource = {}) {
    this.envFile = source.envFile ?? '.env';
    this.env = source.env ?? process.env;
    this.config = this.getDefaultConfiguration();
  }

  /**
   * Loads and validates the configuration, throwing when it is invalid
   */
  loadConfiguration(): BotConfig {
    const variables = { ...this.loadEnvFile(), ...definedOnly(this.env) };
    const config = this.mergeConfigurations(this.getDefaultConfiguration(), variables);

    const validation = this.validateConfiguration(config);
    if (!validation.isValid) {
      throw new Error(`Configuration validation failed: ${validation.errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    this.config = config;
    return this.getConfiguration();
  }

  getConfiguration(): BotConfig {
    return {
      exchange: { ...this.config.exchange },
      logging: { ...this.config.logging },
      strategies: { ...this.config.strategies }
    };
  }

  getConfigSection<T extends keyof BotConfig>(section: T): BotConfig[T] {
    return { ...this.config[section] };
  }

  /**
   * Configuration with credentials masked, for display
   */
  describe(): Record<string, unknown> {
    const config = this.getConfiguration();
    return {
      ...config,
      exchange: {
        ...config.exchange,
        apiKey: mask(config.exchange.apiKey),
        secretKey: mask(config.exchange.secretKey)
      }
    };
  }

  validateConfiguration(config: BotConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];

    if (!config.exchange.apiKey) {
      errors.push({ path: 'exchange.apiKey', message: 'BINANCE_API_KEY is required' });
    }
    if (!config.exchange.secretKey) {
      errors.push({ path: 'exchange.secretKey', message: 'BINANCE_SECRET_KEY is required' });
    }
    if (config.exchange.baseUrl !== undefined && !isHttpUrl(config.exchange.baseUrl)) {
      errors.push({ path: 'exchange.baseUrl', message: 'BINANCE_BASE_URL must be an http(s) URL', value: config.exchange.baseUrl });
    }

    errors.push(...this.validateInterval('exchange.recvWindowMs', config.exchange.recvWindowMs, 60000));
    errors.push(...this.validateInterval('exchange.requestTimeoutMs', config.exchange.requestTimeoutMs));
    errors.push(...this.validateInterval('strategies.gridPollIntervalMs', config.strategies.gridPollIntervalMs));
    errors.push(...this.validateInterval('strategies.ocoPollIntervalMs', config.strategies.ocoPollIntervalMs));

    if (!LOG_LEVELS.includes(config.logging.level)) {
      errors.push({ path: 'logging.level', message: `Log level must be one of ${LOG_LEVELS.join(', ')}`, value: config.logging.level });
    }
    if (!config.logging.file) {
      errors.push({ path: 'logging.file', message: 'Log file path must not be empty' });
    }

    return { isValid: errors.length === 0, errors };
  }

  private validateInterval(path: string, value: number, max?: number): ConfigValidationError[] {
    if (!Number.isInteger(value) || value <= 0) {
      return [{ path, message: 'Must be a positive integer number of milliseconds', value }];
    }
    if (max !== undefined && value > max) {
      return [{ path, message: `Must not exceed ${max}`, value }];
    }
    return [];
  }

  private loadEnvFile(): EnvironmentVariables {
    if (this.envFile === false) {
      return {};
    }
    const filePath = path.resolve(this.envFile);
    if (!fs.existsSync(filePath)) {
      return {};
    }
    return dotenv.parse(fs.readFileSync(filePath));
  }

  private mergeConfigurations(defaults: BotConfig, env: EnvironmentVariables): BotConfig {
    return {
      exchange: {
        apiKey: env.BINANCE_API_KEY ?? defaults.exchange.apiKey,
        secretKey: env.BINANCE_SECRET_KEY ?? defaults.exchange.secretKey,
        testnet: parseBoolean(env.BINANCE_TESTNET, defaults.exchange.testnet),
        baseUrl: env.BINANCE_BASE_URL || defaults.exchange.baseUrl,
        recvWindowMs: parseInteger(env.RECV_WINDOW_MS, defaults.exchange.recvWindowMs),
        requestTimeoutMs: parseInteger(env.REQUEST_TIMEOUT_MS, defaults.exchange.requestTimeoutMs)
      },
      logging: {
        level: parseLogLevel(env.LOG_LEVEL, defaults.logging.level),
        file: env.LOG_FILE ?? defaults.logging.file
      },
      strategies: {
        gridPollIntervalMs: parseInteger(env.GRID_POLL_INTERVAL_MS, defaults.strategies.gridPollIntervalMs),
        ocoPollIntervalMs: parseInteger(env.OCO_POLL_INTERVAL_MS, defaults.strategies.ocoPollIntervalMs)
      }
    };
  }

  private getDefaultConfiguration(): BotConfig {
    return {
      exchange: {
        apiKey: '',
        secretKey: '',
        testnet: true,
        recvWindowMs: 5000,
        requestTimeoutMs: 10000
      },
      logging: {
        level: 'info',
        file: 'logs/bot.log'
      },
      strategies: {
        gridPollIntervalMs: 60000,
        ocoPollIntervalMs: 30000
      }
    };
  }
}

function definedOnly(env: EnvironmentVariables): EnvironmentVariables {
  const result: EnvironmentVariables = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Unparseable values become NaN so validation reports them
 */
function parseInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : Number.NaN;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  return fallback;
}

function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  const level = LOG_LEVELS.find(candidate => candidate === normalized);
  if (!level) {
    throw new Error(`Configuration validation failed: logging.level: Log level must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function mask(secret: string): string {
  if (secret.length <= 4) {
    return secret ? '****' : '';
  }
  return `${secret.slice(0, 4)}****`;
}
