import { Router, Request, Response } from 'express';
import { query } from 'express-validator';
import type { AppServices } from '../../services';
import { validate } from '../middleware/validate';
import { sendError } from '../middleware/errors';
import { readString } from '../body';
import { weatherToWire } from '../serializers';

export function weatherRoutes(services: AppServices): Router {
  const router = Router();

  /** GET /api/weather?location=London - current conditions */
  router.get(
    '/weather',
    validate([query('location').isString().withMessage('must be a string').bail().trim().notEmpty().withMessage('is required')]),
    async (req: Request, res: Response) => {
      try {
        const weather = await services.weather.getWeather(readString(req.query, 'location') ?? '');
        res.json(weatherToWire(weather));
      } catch (e) {
        sendError(res, e, 'Weather fetch');
      }
    }
  );

  return router;
}
