import fs from 'node:fs';
import type { ZodError } from 'zod';
import { ModelFormatError, ModelNotFoundError, describeError } from './errors.js';
import { createPredictor, modelArtifactSchema, type Predictor } from './model-artifact.js';

export type ServiceState = 'ready' | 'degraded';

export interface ModelStatus {
  readonly rainClassifier: Predictor | null;
  readonly precipitationRegressor: Predictor | null;
  readonly loadError: string | null;
}

export interface ModelPaths {
  rainModelPath: string;
  precipitationModelPath: string;
}

const isExistingFile = (modelPath: string): boolean => {
  try {
    return fs.statSync(modelPath).isFile();
  } catch {
    return false;
  }
};

const formatZodIssues = (error: ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');

export const loadModel = (modelPath: string): Predictor => {
  if (!isExistingFile(modelPath)) {
    throw new ModelNotFoundError(modelPath);
  }

  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(modelPath, 'utf8'));
  } catch (error) {
    throw new ModelFormatError(modelPath, describeError(error));
  }

  const parsed = modelArtifactSchema.safeParse(document);
  if (!parsed.success) {
    throw new ModelFormatError(modelPath, formatZodIssues(parsed.error));
  }
  console.log(`[models] loaded ${parsed.data.task} "${parsed.data.name}" from ${modelPath}`);
  return createPredictor(parsed.data);
};

/**
 * Loads both artifacts at startup. A failure on either one leaves BOTH unset and
 * records the first failure message; the process keeps serving in degraded mode.
 */
export const loadModels = (
  { rainModelPath, precipitationModelPath }: ModelPaths,
  load: (modelPath: string) => Predictor = loadModel,
): ModelStatus => {
  try {
    const rainClassifier = load(rainModelPath);
    const precipitationRegressor = load(precipitationModelPath);
    return Object.freeze({ rainClassifier, precipitationRegressor, loadError: null });
  } catch (error) {
    const loadError = describeError(error);
    console.warn(`[models] startup warning: ${loadError}`);
    return Object.freeze({ rainClassifier: null, precipitationRegressor: null, loadError });
  }
};

export const getServiceState = (status: ModelStatus): ServiceState =>
  status.rainClassifier && status.precipitationRegressor ? 'ready' : 'degraded';
