import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { LocationNotFoundError, ProviderError, UnsupportedFormatError, statusOf } from '../../ai/errors';
import { AllModelsExhaustedError, HistoryValidationError } from '../../services/chat';
import { logger } from '../../config/logger';

/**
 * Maps domain errors to HTTP responses. Routes catch and delegate here so every
 * endpoint reports failures in the same shape: { error, details? }.
 */
export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof HistoryValidationError) {
    res.status(400).json({ error: 'Validation failed', details: error.details });
    return;
  }
  if (error instanceof UnsupportedFormatError) {
    res.status(415).json({ error: error.message });
    return;
  }
  if (error instanceof LocationNotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }
  if (error instanceof AllModelsExhaustedError) {
    res.status(502).json({ error: 'All language models are unavailable', attempts: error.attempts() });
    return;
  }
  if (error instanceof ProviderError) {
    logger.error(`${context} failed`, { provider: error.provider, kind: error.kind, error: error.message });
    res.status(502).json({
      error: `${context} failed`,
      provider: error.provider,
      kind: error.kind,
    });
    return;
  }
  logger.error(`${context} failed`, { error: error instanceof Error ? error.message : String(error) });
  res.status(500).json({ error: `${context} failed` });
}

/** Last middleware: upload limits, malformed JSON bodies and anything a route let through. */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof multer.MulterError) {
    res.status(err.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({ error: err.message });
    return;
  }
  // body-parser errors carry their own 4xx status (malformed JSON, payload too large)
  const status = err instanceof ProviderError ? undefined : statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
    return;
  }
  sendError(res, err, 'Request');
}
