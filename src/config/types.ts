export interface ServerConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
}

export interface DatabaseConfig {
  filename: string;
}

export type BotTransport = 'polling' | 'webhook';

export interface TelegramConfig {
  token: string;
  transport: BotTransport;
  webhook: {
    /** Public base URL Telegram posts updates to (path is appended) */
    url?: string | undefined;
    path: string;
    secret?: string | undefined;
  };
}

export interface TMDBConfig {
  apiKey: string;
  baseUrl: string;
  imageBaseUrl: string;
  siteUrl: string;
  timeoutMs: number;
  retry: {
    maxAttempts: number;
    delayMs: number;
  };
  /** Number of entries taken from trending/popular lists */
  listLimit: number;
  parallelDetailFetches: boolean;
}

export interface PromoLink {
  label: string;
  url: string;
}

export interface BotConfig {
  adminIds: number[];
  promoLinks: PromoLink[];
  contact: {
    email?: string | undefined;
    url?: string | undefined;
  };
  favoritesPageSize: number;
  inlineResultLimit: number;
  statsTopLimit: number;
  broadcastDelayMs: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  telegram: TelegramConfig;
  tmdb: TMDBConfig;
  bot: BotConfig;
  logging: LoggingConfig;
}
