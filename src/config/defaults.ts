import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  server: {
    port: 10000,
    host: '0.0.0.0',
    env: 'development',
  },
  database: {
    filename: './data/moviebot.sqlite',
  },
  telegram: {
    token: '',
    transport: 'polling',
    webhook: {
      path: '/webhook',
    },
  },
  tmdb: {
    apiKey: '',
    baseUrl: 'https://api.themoviedb.org/3',
    imageBaseUrl: 'https://image.tmdb.org/t/p',
    siteUrl: 'https://www.themoviedb.org',
    timeoutMs: 10000, // 10 seconds
    retry: {
      maxAttempts: 3,
      delayMs: 5000, // fixed pause between attempts
    },
    listLimit: 5,
    parallelDetailFetches: false,
  },
  bot: {
    adminIds: [],
    promoLinks: [],
    contact: {},
    favoritesPageSize: 10,
    inlineResultLimit: 5,
    statsTopLimit: 10,
    broadcastDelayMs: 100,
  },
  logging: {
    level: 'info',
    file: {
      enabled: true,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
