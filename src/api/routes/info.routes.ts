import { Router } from 'express';
import type { AppServices } from '../../services';

export const API_VERSION = '1.0.0';

export function infoRoutes(services: AppServices): Router {
  const router = Router();
  const { config } = services;

  /** GET /api/info - providers, models and endpoints */
  router.get('/info', (_req, res) => {
    res.json({
      name: 'Voice Assist Gateway',
      version: API_VERSION,
      features: {
        speech_to_text: {
          provider: 'ElevenLabs',
          model: config.speech.sttModel,
          supported_languages: services.stt.supportedLanguages(),
        },
        text_to_speech: {
          provider: 'ElevenLabs',
          model: config.speech.ttsModel,
          voice_id: config.speech.voiceId,
        },
        llm: {
          provider: 'Groq',
          models: services.chat.models,
          force_language: config.llm.forceLanguage,
        },
        weather: {
          provider: 'Open-Meteo',
          enabled: config.weather.enabled,
          features: ['current weather', 'geocoding'],
        },
      },
      endpoints: {
        '/api/speech-to-text': 'Convert audio to text',
        '/api/text-to-speech': 'Convert text to audio',
        '/api/chat': 'Chat with AI assistant',
        '/api/weather': 'Get weather information',
        '/api/voice-chat': 'Complete voice chat flow',
        '/api/assist': 'Unified text or audio input pipeline',
        '/api/translate': 'Translate text between English and Japanese',
      },
    });
  });

  return router;
}
