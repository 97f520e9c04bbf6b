import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import type { AppServices } from '../../services';
import type { TargetLanguage } from '../../types';
import { validate } from '../middleware/validate';
import { sendError } from '../middleware/errors';
import { readString } from '../body';

const TARGETS: readonly TargetLanguage[] = ['en', 'ja'];

function isTarget(value: string | undefined): value is TargetLanguage {
  return TARGETS.some((t) => t === value);
}

export function translateRoutes(services: AppServices): Router {
  const router = Router();

  /** POST /api/translate - { text, target_lang: 'en' | 'ja' } */
  router.post(
    '/translate',
    validate([
      body('text').isString().withMessage('must be a string').bail().trim().notEmpty().withMessage('is required'),
      body('target_lang').isIn(TARGETS).withMessage(`must be one of: ${TARGETS.join(', ')}`),
    ]),
    async (req: Request, res: Response) => {
      try {
        const target = readString(req.body, 'target_lang');
        if (!isTarget(target)) {
          res.status(400).json({ error: 'Validation failed', details: ['target_lang: unsupported'] });
          return;
        }
        const result = await services.translator.translate(readString(req.body, 'text') ?? '', target);
        res.json({ translated_text: result.text, model_used: result.modelUsed });
      } catch (e) {
        sendError(res, e, 'Translation');
      }
    }
  );

  return router;
}
