import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import type { AppServices } from '../../services';
import { appendExchange, parseHistory } from '../../services/chat';
import { validate } from '../middleware/validate';
import { sendError } from '../middleware/errors';
import { readField, readString } from '../body';
import { chatResultToWire } from '../serializers';

export function chatRoutes(services: AppServices): Router {
  const router = Router();

  /** POST /api/chat - text message + optional history -> reply from the first model that answers */
  router.post(
    '/chat',
    validate([
      body('message').isString().withMessage('must be a string').bail().trim().notEmpty().withMessage('is required'),
      body('conversation_history').optional({ values: 'null' }).isArray().withMessage('must be an array'),
      body('system_prompt').optional({ values: 'null' }).isString().withMessage('must be a string'),
    ]),
    async (req: Request, res: Response) => {
      try {
        const message = readString(req.body, 'message') ?? '';
        const history = parseHistory(readField(req.body, 'conversation_history'));
        const result = await services.chat.respond({
          message,
          history,
          systemPrompt: readString(req.body, 'system_prompt'),
        });
        const updated = appendExchange(history, message, result.text, services.config.llm.historyLimit);
        res.json(chatResultToWire(result, updated));
      } catch (e) {
        sendError(res, e, 'Chat completion');
      }
    }
  );

  return router;
}
