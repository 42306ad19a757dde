/**
 * Express application factory.
 * Configures middleware and mounts routes over the injected store and generator,
 * so tests can build the app around an in-memory database and a stub provider.
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { config } from '../shared/config';
import type { ContentGenerator } from '../shared/generation';
import type { ResumeStore } from '../shared/storage';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createAiRouter } from './routes/ai';
import { createCoverLettersRouter } from './routes/coverLetters';
import { createDataRouter } from './routes/data';
import { createResumesRouter } from './routes/resumes';

export interface AppDependencies {
  storage: ResumeStore;
  generator: ContentGenerator;
  /** Origins allowed by CORS; localhost on any port is always allowed */
  corsOrigins?: string[];
}

export function createApp({ storage, generator, corsOrigins = config.cors.origins }: AppDependencies): Application {
  const app = express();

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Same-origin and non-browser clients send no origin
      if (!origin) {
        return callback(null, true);
      }
      if (corsOrigins.includes(origin) || /^https?:\/\/localhost(:\d+)?$/.test(origin)) {
        return callback(null, true);
      }
      callback(new Error('Not allowed by CORS'));
    },
  };

  app.use(requestLogger);
  app.use(cors(corsOptions));
  app.use(express.json({ limit: '5mb' }));

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', provider: generator.getProviderName() });
  });

  app.use('/api/resumes', createResumesRouter(storage));
  app.use('/api/cover-letters', createCoverLettersRouter(storage));
  app.use('/api/ai', createAiRouter({ generator, storage }));
  app.use('/api/data', createDataRouter(storage));

  app.use('/api', notFoundHandler);
  app.use(errorHandler);

  return app;
}
