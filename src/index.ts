/**
 * Backend entry point: load config, build services, start the HTTP server.
 */
import { createServer } from 'http';
import { config } from './config';
import { logger } from './config/logger';
import { createServices } from './services';
import { createApp } from './api/app';

async function start() {
  logger.level = config.logLevel;

  logger.info('Initializing services...');
  const services = createServices(config);
  const app = createApp(services);

  if (!config.llm.groqApiKey) {
    logger.warn('GROQ_API_KEY is not set; chat requests will fail until it is configured');
  }
  if (!config.speech.elevenLabsApiKey) {
    logger.warn('ELEVENLABS_API_KEY is not set; speech-to-text and text-to-speech are unavailable');
  }
  logger.info('LLM fallback order', { models: services.chat.models });
  logger.info('Weather tool', { enabled: config.weather.enabled });

  const httpServer = createServer(app);
  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.port, config.host, () => resolve());
  });
  logger.info(`Server listening on ${config.host}:${config.port} (env: ${config.env})`);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    httpServer.close((err) => {
      if (err) {
        logger.error('Error while closing server', { error: err.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return httpServer;
}

const serverPromise = start().catch((e: unknown) => {
  logger.error('Startup failed:', { error: e instanceof Error ? e.message : String(e) });
  process.exit(1);
});

export default serverPromise;
