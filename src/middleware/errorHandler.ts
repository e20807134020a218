import { Request, Response, NextFunction } from 'express';
import { logger } from './logging.js';
import { ApplicationError } from '../errors/index.js';

/**
 * Unified error handler for the webhook server
 * Turns ApplicationErrors into JSON responses and logs the request context
 */
export const errorHandler = (
  error: Error | ApplicationError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  let statusCode: number;
  let message: string;
  let errorCode: string | undefined;

  const request = {
    method: req.method,
    url: req.url,
    ip: req.ip,
  };

  if (error instanceof ApplicationError) {
    statusCode = error.statusCode;
    message = error.isOperational ? error.message : 'Internal server error';
    errorCode = error.code;

    logger.error('Request error', {
      error: error.toJSON(),
      request,
    });
  } else {
    statusCode = 500;
    message = 'Internal server error';

    logger.error('Request error (generic)', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      request,
    });
  }

  res.status(statusCode).json({
    error: {
      message,
      status: statusCode,
      ...(errorCode && { code: errorCode }),
    },
  });
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.url} not found`,
      status: 404,
    },
  });
};
