import fs from 'fs';
import path from 'path';
import logger from './logger';
import { Config, LogLevel } from './types';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_CONFIG_PATH = path.join('config', 'config.json');

function positiveIntOr(raw: unknown, fallback: number): number {
  const value = typeof raw === 'number' ? raw : Number.parseInt(String(raw ?? ''), 10);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function logLevelOr(raw: unknown, fallback: LogLevel): LogLevel {
  return LOG_LEVELS.find(level => level === raw) ?? fallback;
}

/**
 * Builds the fetcher configuration from defaults, environment variables and an
 * optional JSON file. A manager is created once at startup and its config is
 * handed to every command; nothing here is module-level state.
 */
export class ConfigManager {
  private config: Config;
  private configPath: string;

  constructor(configPath?: string, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || env.FETCHER_CONFIG_PATH || path.resolve(process.cwd(), DEFAULT_CONFIG_PATH);
    this.config = this.loadConfig();
  }

  private loadConfig(): Config {
    const env = this.env;
    const defaultConfig: Config = {
      app: {
        name: 'Binance Futures Data Fetcher',
        version: '1.0.0',
        logLevel: logLevelOr(env.LOG_LEVEL, 'info')
      },
      exchange: {
        enableRateLimit: env.FETCHER_RATE_LIMIT !== 'false',
        defaultType: 'future'
      },
      defaults: {
        symbol: env.FETCHER_SYMBOL?.trim() || 'BTC/USDT:USDT',
        timeframe: env.FETCHER_TIMEFRAME?.trim() || '1h',
        ohlcvLimit: positiveIntOr(env.FETCHER_OHLCV_LIMIT, 100),
        orderbookLimit: positiveIntOr(env.FETCHER_ORDERBOOK_LIMIT, 20),
        tradesLimit: positiveIntOr(env.FETCHER_TRADES_LIMIT, 50),
        pairsLimit: positiveIntOr(env.FETCHER_PAIRS_LIMIT, 20)
      },
      display: {
        candles: 5,
        bookLevels: 5,
        trades: 10
      }
    };

    try {
      if (fs.existsSync(this.configPath)) {
        const configData = fs.readFileSync(this.configPath, 'utf8');
        const parsed = JSON.parse(configData) as Partial<Config>;

        const mergedConfig: Config = {
          app: { ...defaultConfig.app, ...parsed.app },
          exchange: { ...defaultConfig.exchange, ...parsed.exchange },
          defaults: { ...defaultConfig.defaults, ...parsed.defaults },
          display: { ...defaultConfig.display, ...parsed.display }
        };

        // Values from the file are untyped JSON; bad entries fall back to defaults.
        mergedConfig.app.logLevel = logLevelOr(mergedConfig.app.logLevel, defaultConfig.app.logLevel);
        mergedConfig.exchange.enableRateLimit = mergedConfig.exchange.enableRateLimit !== false;
        mergedConfig.exchange.defaultType = 'future';
        for (const key of ['symbol', 'timeframe'] as const) {
          const value: unknown = mergedConfig.defaults[key];
          mergedConfig.defaults[key] = typeof value === 'string' && value.trim() ? value.trim() : defaultConfig.defaults[key];
        }
        for (const key of ['ohlcvLimit', 'orderbookLimit', 'tradesLimit', 'pairsLimit'] as const) {
          mergedConfig.defaults[key] = positiveIntOr(mergedConfig.defaults[key], defaultConfig.defaults[key]);
        }
        for (const key of ['candles', 'bookLevels', 'trades'] as const) {
          mergedConfig.display[key] = positiveIntOr(mergedConfig.display[key], defaultConfig.display[key]);
        }

        return mergedConfig;
      }
    } catch (error) {
      logger.warn(`[Config] Could not load ${this.configPath}, using defaults: ${error instanceof Error ? error.message : String(error)}`);
    }

    return defaultConfig;
  }

  public get(): Config {
    return this.config;
  }

  public getSection<K extends keyof Config>(section: K): Config[K] {
    return this.config[section];
  }
}
