import dotenv from 'dotenv';
import { AppConfig, BotTransport, LoggingConfig, PromoLink } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

type Env = Record<string, string | undefined>;

/**
 * Builds the AppConfig value once at startup. Components receive the
 * resulting object (or the slice they need) by reference; nothing reads
 * process.env after this point.
 */
export class ConfigManager {
  private readonly config: AppConfig;

  constructor(private readonly env: Env) {
    this.config = this.loadConfig();
  }

  /**
   * Load .env into process.env and build the configuration from it
   */
  static load(): ConfigManager {
    dotenv.config();
    return new ConfigManager(process.env);
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = JSON.parse(JSON.stringify(defaultConfig));

    // Server configuration
    config.server.port = this.getNumber('PORT', config.server.port);
    config.server.host = this.getString('HOST', config.server.host);
    config.server.env = this.getEnum('NODE_ENV', config.server.env, [
      'development',
      'production',
      'test',
    ]);

    // Database configuration
    config.database.filename = this.getString('DB_FILE', config.database.filename);

    // Telegram
    config.telegram.token = this.getString('TELEGRAM_BOT_TOKEN');
    config.telegram.transport = this.getEnum<BotTransport>(
      'BOT_TRANSPORT',
      config.telegram.transport,
      ['polling', 'webhook']
    );
    config.telegram.webhook.url = this.env.WEBHOOK_URL || undefined;
    config.telegram.webhook.path = this.getString('WEBHOOK_PATH', config.telegram.webhook.path);
    config.telegram.webhook.secret = this.env.WEBHOOK_SECRET || undefined;

    // TMDB
    config.tmdb.apiKey = this.getString('TMDB_API_KEY');
    config.tmdb.baseUrl = this.getString('TMDB_BASE_URL', config.tmdb.baseUrl);
    config.tmdb.imageBaseUrl = this.getString('TMDB_IMAGE_BASE_URL', config.tmdb.imageBaseUrl);
    config.tmdb.siteUrl = this.getString('TMDB_SITE_URL', config.tmdb.siteUrl);
    config.tmdb.timeoutMs = this.getNumber('TMDB_TIMEOUT_MS', config.tmdb.timeoutMs);
    config.tmdb.retry.maxAttempts = this.getNumber(
      'TMDB_RETRY_ATTEMPTS',
      config.tmdb.retry.maxAttempts
    );
    config.tmdb.retry.delayMs = this.getNumber('TMDB_RETRY_DELAY_MS', config.tmdb.retry.delayMs);
    config.tmdb.parallelDetailFetches = this.getBoolean(
      'TMDB_PARALLEL_DETAILS',
      config.tmdb.parallelDetailFetches
    );

    // Bot behaviour
    config.bot.adminIds = this.getNumberArray('ADMIN_IDS');
    config.bot.promoLinks = this.getPromoLinks('PROMO_LINKS');
    config.bot.contact.email = this.env.CONTACT_EMAIL || undefined;
    config.bot.contact.url = this.env.CONTACT_URL || undefined;
    config.bot.broadcastDelayMs = this.getNumber('BROADCAST_DELAY_MS', config.bot.broadcastDelayMs);

    // Logging configuration
    config.logging.level = this.getEnum<LoggingConfig['level']>('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    this.validate(config);
    return config;
  }

  private getString(key: string, defaultValue?: string): string {
    const value = this.env[key];
    if (value) {
      return value;
    }
    if (defaultValue === undefined) {
      throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
    }
    return defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getStringArray(key: string): string[] {
    const value = this.env[key];
    if (!value) {
      return [];
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getNumberArray(key: string): number[] {
    return this.getStringArray(key).map(item => {
      if (!/^\d+$/.test(item)) {
        throw new ConfigurationError(key, `Environment variable ${key} must list numeric ids, got '${item}'`);
      }
      return Number(item);
    });
  }

  /**
   * Parses `label|url` pairs separated by commas, keeping their order
   */
  private getPromoLinks(key: string): PromoLink[] {
    return this.getStringArray(key).map(entry => {
      const separator = entry.indexOf('|');
      const label = separator > 0 ? entry.slice(0, separator).trim() : '';
      const url = separator > 0 ? entry.slice(separator + 1).trim() : '';
      if (!label || !/^https?:\/\//.test(url)) {
        throw new ConfigurationError(key, `Environment variable ${key} has an invalid entry: '${entry}'`);
      }
      return { label, url };
    });
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  private validate(config: AppConfig): void {
    const errors: string[] = [];

    if (config.telegram.transport === 'webhook' && !config.telegram.webhook.url) {
      errors.push('WEBHOOK_URL is required when BOT_TRANSPORT=webhook');
    }

    if (!config.telegram.webhook.path.startsWith('/')) {
      errors.push('WEBHOOK_PATH must start with /');
    }

    if (config.tmdb.retry.maxAttempts < 1) {
      errors.push('TMDB_RETRY_ATTEMPTS must be at least 1');
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        'validation',
        `Configuration validation failed:\n${errors.join('\n')}`
      );
    }
  }

  getConfig(): AppConfig {
    return this.config;
  }
}
