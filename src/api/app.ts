/**
 * Express app: CORS, request logging, activity and GenAI routes,
 * static front-end. Dependencies are passed in so tests can build isolated apps.
 */

import express, { Express } from 'express';
import cors from 'cors';
import path from 'path';
import { createActivityRoutes } from './routes/activities';
import { createGenAIRoutes } from './routes/genai.routes';
import { requestLogger } from './middleware/requestLogger';
import { errorHandler } from './middleware/errorHandler';
import { ActivityService } from '../services/activity.service';
import type { SystemEngineeringService } from '../services/genai/SystemEngineeringService';

/** Both src/api and dist/api sit two levels below the repository root. */
export const STATIC_DIR = path.resolve(__dirname, '..', '..', 'static');

export interface AppDependencies {
  /** `null` when the GenAI module could not be loaded; task routes answer 503. */
  genai: SystemEngineeringService | null;
  activities?: ActivityService;
}

export function createApp({ genai, activities = new ActivityService() }: AppDependencies): Express {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));
  app.use(requestLogger);
  app.use('/static', express.static(STATIC_DIR));

  app.get('/', (_req, res) => {
    res.redirect('/static/index.html');
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  app.use('/activities', createActivityRoutes(activities));
  app.use('/genai', createGenAIRoutes(genai));

  app.use(errorHandler);

  return app;
}
