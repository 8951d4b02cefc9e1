import type { Express } from 'express';
import { registerDescriptorRoute } from '../routes/descriptor.js';
import { registerHealthRoutes } from '../routes/health.js';
import { registerPredictRoutes } from '../routes/predict.js';
import type { ModelStatus } from '../utils/model-loader.js';
import { createApp } from './create-app.js';
import { registerErrorHandlers } from './error-handler.js';

export interface BuildApiOptions {
  models: ModelStatus;
  repositoryUrl: string;
  isProduction?: boolean;
  corsAllowlist?: string[];
}

export const buildApi = ({ models, repositoryUrl, isProduction = false, corsAllowlist = [] }: BuildApiOptions): Express => {
  const app = createApp({ isProduction, corsAllowlist });

  registerDescriptorRoute(app, repositoryUrl);
  registerHealthRoutes(app, models);
  registerPredictRoutes({ app, models });
  registerErrorHandlers(app);

  return app;
};
