import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { config } from './config';
import { createPromptsRouter } from './routes/prompts';
import modelRoutes from './routes/models';
import resultRoutes from './routes/results';
import settingRoutes from './routes/settings';
import type { DispatchEngine } from './services/dispatchEngine';
import type { PromptImprover } from './services/promptImprover';

export interface AppDependencies {
  engine: DispatchEngine;
  improver: PromptImprover;
}

export function createApp({ engine, improver }: AppDependencies) {
  const app = express();

  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));
  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true
    })
  );
  if (config.env !== 'test') {
    app.use(morgan('dev'));
  }

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/prompts', createPromptsRouter(engine, improver));
  app.use('/models', modelRoutes);
  app.use('/results', resultRoutes);
  app.use('/settings', settingRoutes);

  app.use((_req, res) => {
    res.status(404).json({ error: { code: 'NotFound', message: 'Route not found' } });
  });

  return app;
}
