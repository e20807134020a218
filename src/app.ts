import express from 'express';
import { createServer, Server as HttpServer } from 'http';
import { AppConfig } from './config/types.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { MigrationRunner } from './database/MigrationRunner.js';
import { TMDBClient } from './services/providers/tmdb/TMDBClient.js';
import { MovieLookupService } from './services/movieLookupService.js';
import { UserService } from './services/userService.js';
import { FavoriteService } from './services/favoriteService.js';
import { SearchLogService } from './services/searchLogService.js';
import { TelegramBotService } from './services/bot/TelegramBotService.js';
import { securityMiddleware, requireWebhookSecret } from './middleware/security.js';
import {
  requestLoggingMiddleware,
  errorLoggingMiddleware,
  initializeLogger,
  logger,
} from './middleware/logging.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createErrorLogContext } from './utils/errorHandling.js';

export class App {
  public express: express.Application;
  private httpServer: HttpServer | undefined;
  private readonly dbManager: DatabaseManager;
  private bot: TelegramBotService | undefined;
  private readonly startedAt = Date.now();

  constructor(private readonly config: AppConfig) {
    initializeLogger(config.logging);
    this.express = express();
    this.dbManager = new DatabaseManager(config.database);
  }

  private initializeMiddleware(): void {
    this.express.set('trust proxy', 1);
    this.express.use(securityMiddleware);
    this.express.use(requestLoggingMiddleware);
  }

  private initializeRoutes(webhookHandler: express.RequestHandler): void {
    this.express.get('/health', (_req, res) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        transport: this.config.telegram.transport,
        bot: this.bot?.getStatus() ?? 'stopped',
        uptimeSeconds: Math.round((Date.now() - this.startedAt) / 1000),
        database: this.dbManager.isConnected() ? 'connected' : 'disconnected',
      });
    });

    this.express.post(
      this.config.telegram.webhook.path,
      requireWebhookSecret(this.config.telegram.webhook.secret),
      express.json({ limit: '1mb' }),
      webhookHandler
    );
  }

  private initializeErrorHandling(): void {
    this.express.use(errorLoggingMiddleware);
    this.express.use(notFoundHandler);
    this.express.use(errorHandler);
  }

  public async start(): Promise<void> {
    await this.dbManager.connect();

    const db = this.dbManager.getConnection();
    const applied = await new MigrationRunner(db).migrate();
    logger.info('Database migrations completed', { applied });

    const users = new UserService(db, this.config.bot.adminIds);
    await users.seedAdmins();

    const { tmdb } = this.config;
    const lookup = new MovieLookupService(
      new TMDBClient({
        apiKey: tmdb.apiKey,
        baseUrl: tmdb.baseUrl,
        timeoutMs: tmdb.timeoutMs,
        retry: tmdb.retry,
      }),
      {
        urls: { imageBaseUrl: tmdb.imageBaseUrl, siteUrl: tmdb.siteUrl },
        listLimit: tmdb.listLimit,
        parallelDetailFetches: tmdb.parallelDetailFetches,
      }
    );

    this.bot = new TelegramBotService(this.config.telegram, this.config.bot, {
      lookup,
      users,
      favorites: new FavoriteService(db),
      searches: new SearchLogService(db),
    });

    if (this.config.telegram.transport === 'polling') {
      await this.bot.startPolling();
      return;
    }

    const webhookHandler = await this.bot.createWebhookHandler();
    this.initializeMiddleware();
    this.initializeRoutes(webhookHandler);
    this.initializeErrorHandling();

    const { port, host } = this.config.server;
    const server = createServer(this.express);
    this.httpServer = server;
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    logger.info(`Webhook server listening on ${host}:${port}`, {
      path: this.config.telegram.webhook.path,
      env: this.config.server.env,
    });
  }

  public async stop(): Promise<void> {
    try {
      this.bot?.stop('shutdown');

      const server = this.httpServer;
      if (server) {
        await new Promise<void>((resolve, reject) => {
          server.close(error => (error ? reject(error) : resolve()));
        });
        this.httpServer = undefined;
        logger.info('Webhook server closed');
      }

      await this.dbManager.disconnect();
      logger.info('Bot stopped gracefully');
    } catch (error) {
      logger.error('Error during shutdown', createErrorLogContext(error));
    }
  }
}

/**
 * Build the App from a configuration loader. A loader failure (a missing or
 * malformed environment value) is logged and yields null.
 */
export function loadApp(loadConfig: () => AppConfig): App | null {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error('Failed to load configuration', createErrorLogContext(error));
    return null;
  }
  return new App(config);
}
