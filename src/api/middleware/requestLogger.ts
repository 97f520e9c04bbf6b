import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';

/** Tags each request with an id (echoed as X-Request-Id) and logs it on completion. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get('x-request-id');
  const requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
  const started = process.hrtime.bigint();
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
    logger.http(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      durationMs: Math.round(durationMs),
    });
  });
  next();
}
