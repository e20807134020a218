import { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LoggingConfig } from '../config/types.js';

// Default console logger so modules can log before initializeLogger() runs
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

let isInitialized = false;

/**
 * Reconfigure the logger from the loaded configuration.
 * Called once by App.start() after the configuration is built.
 */
export function initializeLogger(config: LoggingConfig): void {
  if (isInitialized) {
    return;
  }

  logger.level = config.level;

  logger.clear();

  if (config.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`, // Keep logs for N days
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/app-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: config.file.maxSize,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-app.json`,
      })
    );
  }

  if (config.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  // winston warns when every transport is removed
  if (!config.file.enabled && !config.console.enabled) {
    logger.add(new winston.transports.Console({ silent: true }));
  }

  isInitialized = true;
  logger.info('Logger initialized with configuration', { level: config.level });
}

// Morgan middleware for webhook HTTP request logging
export const requestLoggingMiddleware = morgan('combined', {
  stream: {
    write: (message: string) => {
      logger.info(message.trim());
    },
  },
});

// Error logging middleware
export const errorLoggingMiddleware = (
  error: Error,
  req: Request,
  _res: Response,
  next: NextFunction
): void => {
  logger.error({
    message: error.message,
    stack: error.stack,
    url: req.url,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  });

  next(error);
};
