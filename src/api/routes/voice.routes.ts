/**
 * Voice endpoints: speech-to-text, text-to-speech, and the combined flows
 * (voice chat: transcribe -> chat; assist: text and/or audio -> chat -> optional speech).
 */
import { Router, Request, Response } from 'express';
import multer from 'multer';
import { body } from 'express-validator';
import type { AppServices } from '../../services';
import { appendExchange, parseHistoryField } from '../../services/chat';
import { logger } from '../../config/logger';
import { validate } from '../middleware/validate';
import { sendError } from '../middleware/errors';
import { readField, readFlag, readString } from '../body';
import { chatResultToWire } from '../serializers';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 25 * 1024 * 1024 },
});

function uploadedAudio(req: Request): Express.Multer.File | undefined {
  if (req.file) return req.file;
  const files = req.files;
  if (files && !Array.isArray(files)) return files.audio_file?.[0];
  return undefined;
}

export function voiceRoutes(services: AppServices): Router {
  const router = Router();
  const { chat, stt, tts, config } = services;

  const transcribe = (file: Express.Multer.File) =>
    stt.transcribe(file.buffer, { mimeType: file.mimetype, filename: file.originalname });

  /** POST /api/speech-to-text - multipart audio_file -> { text } */
  router.post('/speech-to-text', upload.single('audio_file'), async (req: Request, res: Response) => {
    try {
      const file = uploadedAudio(req);
      if (!file || !file.buffer.length) {
        res.status(400).json({ error: 'Empty audio file' });
        return;
      }
      logger.debug('speech-to-text upload', { filename: file.originalname, mimetype: file.mimetype, bytes: file.size });
      const text = await transcribe(file);
      res.json({ text });
    } catch (e) {
      sendError(res, e, 'Transcription');
    }
  });

  /** POST /api/text-to-speech - { text, voice_id?, model_id? } -> audio/mpeg */
  router.post(
    '/text-to-speech',
    validate([
      body('text').isString().withMessage('must be a string').bail().trim().notEmpty().withMessage('is required'),
      body('voice_id').optional({ values: 'null' }).isString().withMessage('must be a string'),
      body('model_id').optional({ values: 'null' }).isString().withMessage('must be a string'),
    ]),
    async (req: Request, res: Response) => {
      try {
        const audio = await tts.synthesize(readString(req.body, 'text') ?? '', {
          voiceId: readString(req.body, 'voice_id'),
          model: readString(req.body, 'model_id'),
        });
        res.set({ 'Content-Type': 'audio/mpeg', 'Content-Length': String(audio.length) });
        res.send(audio);
      } catch (e) {
        sendError(res, e, 'Speech synthesis');
      }
    }
  );

  /** POST /api/voice-chat - multipart audio_file (+ conversation_history JSON, system_prompt) */
  router.post('/voice-chat', upload.single('audio_file'), async (req: Request, res: Response) => {
    try {
      const history = parseHistoryField(readField(req.body, 'conversation_history'));
      const file = uploadedAudio(req);
      if (!file || !file.buffer.length) {
        res.status(400).json({ error: 'Empty audio file' });
        return;
      }
      const transcribed = await transcribe(file);
      const result = await chat.respond({
        message: transcribed,
        history,
        systemPrompt: readString(req.body, 'system_prompt'),
      });
      const updated = appendExchange(history, transcribed, result.text, config.llm.historyLimit);
      res.json({ transcribed_text: transcribed, ...chatResultToWire(result, updated) });
    } catch (e) {
      sendError(res, e, 'Voice chat');
    }
  });

  /**
   * POST /api/assist - text and/or audio. With both, the transcript is appended to the text.
   * synthesize=true adds the spoken reply as base64 MPEG; a synthesis failure does not fail the request.
   */
  router.post(
    '/assist',
    upload.fields([{ name: 'audio_file', maxCount: 1 }]),
    async (req: Request, res: Response) => {
      try {
        const history = parseHistoryField(readField(req.body, 'conversation_history'));
        const text = (readString(req.body, 'message') ?? '').trim();
        const file = uploadedAudio(req);

        let transcribed: string | null = null;
        let message = text;
        if (file) {
          if (!file.buffer.length) {
            res.status(400).json({ error: 'Empty audio file' });
            return;
          }
          transcribed = await transcribe(file);
          message = text ? `${text}\n\n[Audio: ${transcribed}]` : transcribed;
        }
        if (!message) {
          res.status(400).json({ error: "Provide either 'message' or 'audio_file'" });
          return;
        }

        const result = await chat.respond({ message, history, systemPrompt: readString(req.body, 'system_prompt') });
        const updated = appendExchange(history, message, result.text, config.llm.historyLimit);
        const payload: Record<string, unknown> = {
          input_type: file ? 'audio' : 'text',
          transcribed_text: transcribed,
          ...chatResultToWire(result, updated),
        };

        if (readFlag(req.body, 'synthesize')) {
          try {
            payload.audio_base64 = (await tts.synthesize(result.text)).toString('base64');
          } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            logger.warn('Assist reply synthesis failed; returning text only', { reason });
            payload.synthesis_error = reason;
          }
        }
        res.json(payload);
      } catch (e) {
        sendError(res, e, 'Assist pipeline');
      }
    }
  );

  return router;
}
