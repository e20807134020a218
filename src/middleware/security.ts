import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { timingSafeEqual } from 'crypto';
import { AuthenticationError } from '../errors/index.js';

/**
 * The webhook server only speaks JSON, so the content policy locks everything down
 */
export const securityMiddleware = [
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
  }),
];

export const TELEGRAM_SECRET_HEADER = 'x-telegram-bot-api-secret-token';

/**
 * Rejects webhook deliveries that do not carry the configured secret token.
 * No-op when no secret is configured.
 */
export const requireWebhookSecret = (secret: string | undefined) => {
  const expected = secret ? Buffer.from(secret) : undefined;

  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!expected) {
      next();
      return;
    }

    const header = req.headers[TELEGRAM_SECRET_HEADER];
    const provided = Buffer.from(typeof header === 'string' ? header : '');
    if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
      next(new AuthenticationError('Invalid webhook secret token', {
        service: 'webhook',
        operation: 'verifySecret',
        metadata: { ip: req.ip },
      }));
      return;
    }

    next();
  };
};
