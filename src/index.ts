/**
 * Backend entry point: decide GenAI availability once, then start the HTTP server.
 */
import { createServer } from 'http';
import { createApp } from './api/app';
import { config } from './config';
import { logger } from './config/logger';
import {
  SystemEngineeringService,
  createSystemEngineeringService,
} from './services/genai/SystemEngineeringService';
import { describeError } from './utils/errors';

function loadGenAI(): SystemEngineeringService | null {
  try {
    const genai = createSystemEngineeringService();
    if (genai.isEnabled()) {
      logger.info('GenAI system engineering enabled', { model: genai.model });
    } else {
      logger.warn('GenAI system engineering disabled: OPENAI_API_KEY is not set');
    }
    return genai;
  } catch (e) {
    logger.error('GenAI module unavailable', { error: describeError(e) });
    return null;
  }
}

function start() {
  const app = createApp({ genai: loadGenAI() });
  const httpServer = createServer(app);

  const host = process.env.HOST || '0.0.0.0';
  return httpServer.listen(config.port, host, () => {
    logger.info(`Server listening on ${host}:${config.port} (env: ${config.env})`);
  });
}

const server = start();

export default server;
