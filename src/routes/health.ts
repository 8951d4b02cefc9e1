import type { Express, Request, Response } from 'express';
import { getServiceState, type ModelStatus } from '../utils/model-loader.js';

export const READY_MESSAGE = 'API is ready. Models loaded.';

export const healthMessage = ({ loadError }: ModelStatus): string =>
  loadError === null ? READY_MESSAGE : `Startup warning: ${loadError}`;

const healthPayload = (models: ModelStatus) => {
  const state = getServiceState(models);
  return {
    ok: state === 'ready',
    state,
    models: {
      rain: models.rainClassifier !== null,
      precipitation: models.precipitationRegressor !== null,
    },
    loadError: models.loadError,
    env: process.env.NODE_ENV || 'development',
    uptime: Math.floor(process.uptime()),
    timestamp: new Date().toISOString(),
  };
};

// Load failures are reported in the body; both routes always answer 200.
export const registerHealthRoutes = (app: Express, models: ModelStatus) => {
  app.get('/health/', (_req: Request, res: Response) => {
    res.json(healthMessage(models));
  });

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json(healthPayload(models));
  });
};
