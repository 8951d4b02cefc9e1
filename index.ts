import { buildApi } from './src/server/build-api.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  CORS_ALLOWLIST,
  RAIN_MODEL_PATH,
  PRECIP_MODEL_PATH,
  GITHUB_URL,
} from './src/server/runtime.js';
import { loadModels } from './src/utils/model-loader.js';

export const models = loadModels({
  rainModelPath: RAIN_MODEL_PATH,
  precipitationModelPath: PRECIP_MODEL_PATH,
});

export const app = buildApi({
  models,
  repositoryUrl: GITHUB_URL,
  isProduction: IS_PRODUCTION,
  corsAllowlist: CORS_ALLOWLIST,
});

if (process.env.NODE_ENV !== 'test') {
  startServer({ app, port: PORT });
}
