import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger } from '../utils/logger.js';

/**
 * Tags the request with an id (client-supplied X-Request-ID or a fresh UUID),
 * echoes it back, and runs the rest of the chain inside the logging context.
 * Logs arrival and completion with the response status and duration.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header ? header : randomUUID();
  res.setHeader('X-Request-ID', requestId);

  const startTime = Date.now();
  requestContext.run({ requestId, method: req.method, path: req.path }, () => {
    logger.info({ ip: req.ip }, 'Incoming request');
    res.on('finish', () => {
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      logger[level]({ statusCode: res.statusCode, duration: Date.now() - startTime }, 'Request completed');
    });
    next();
  });
}
