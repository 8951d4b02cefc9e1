import path from 'node:path';
import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

export const PORT = parsePositiveInt(process.env.PORT, 3001);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

export const MODEL_BASE_DIR = path.resolve(process.cwd(), process.env.MODEL_BASE_DIR || 'models');
export const RAIN_MODEL_PATH = process.env.RAIN_MODEL_PATH || path.join(MODEL_BASE_DIR, 'rain_or_not', 'rain-classifier.json');
export const PRECIP_MODEL_PATH =
  process.env.PRECIP_MODEL_PATH || path.join(MODEL_BASE_DIR, 'precipitation_fall', 'precipitation-regressor.json');

export const GITHUB_URL_DEFAULT = 'https://github.com/your-user/your-repo';
export const GITHUB_URL = process.env.GITHUB_URL || GITHUB_URL_DEFAULT;

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);
