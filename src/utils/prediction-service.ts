import { InferenceFailureError, ModelUnavailableError } from './errors.js';
import { buildFeatureFrame } from './features.js';
import type { Predictor } from './model-artifact.js';
import type { ModelStatus } from './model-loader.js';
import { formatIsoDate, formatOneDecimal, parseBaseDate, shiftDays } from './time.js';

export const RAIN_HORIZON_DAYS = 7;
export const PRECIPITATION_WINDOW_START_DAYS = 1;
export const PRECIPITATION_WINDOW_END_DAYS = 3;

export interface RainPrediction {
  input_date: string;
  prediction: {
    date: string;
    will_rain: boolean;
  };
}

export interface PrecipitationFallPrediction {
  input_date: string;
  prediction: {
    start_date: string;
    end_date: string;
    precipitation_fall: string;
  };
}

// Frame is always built from the base date; target dates only label the response.
const predictFirstValue = (model: Predictor, baseDate: Date, task: string): number => {
  try {
    const [first] = model.predict(buildFeatureFrame(baseDate));
    if (first === undefined) {
      throw new Error('model returned no output');
    }
    return first;
  } catch (error) {
    throw new InferenceFailureError(task, error);
  }
};

export const predictRain = (status: ModelStatus, dateText: string): RainPrediction => {
  const model = status.rainClassifier;
  if (!model) {
    throw new ModelUnavailableError('Rain', status.loadError);
  }

  const baseDate = parseBaseDate(dateText);
  const targetDate = shiftDays(baseDate, RAIN_HORIZON_DAYS);
  const willRain = Boolean(predictFirstValue(model, baseDate, 'rain'));

  return {
    input_date: formatIsoDate(baseDate),
    prediction: {
      date: formatIsoDate(targetDate),
      will_rain: willRain,
    },
  };
};

export const predictPrecipitationFall = (status: ModelStatus, dateText: string): PrecipitationFallPrediction => {
  const model = status.precipitationRegressor;
  if (!model) {
    throw new ModelUnavailableError('Precipitation', status.loadError);
  }

  const baseDate = parseBaseDate(dateText);
  const startDate = shiftDays(baseDate, PRECIPITATION_WINDOW_START_DAYS);
  const endDate = shiftDays(baseDate, PRECIPITATION_WINDOW_END_DAYS);
  const amount = Number(predictFirstValue(model, baseDate, 'precipitation'));
  if (!Number.isFinite(amount)) {
    throw new InferenceFailureError('precipitation', `model returned a non-numeric value (${amount})`);
  }

  return {
    input_date: formatIsoDate(baseDate),
    prediction: {
      start_date: formatIsoDate(startDate),
      end_date: formatIsoDate(endDate),
      precipitation_fall: formatOneDecimal(amount),
    },
  };
};
