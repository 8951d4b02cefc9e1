import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import { InvalidDateFormatError } from '../utils/errors.js';
import type { ModelStatus } from '../utils/model-loader.js';
import { predictPrecipitationFall, predictRain } from '../utils/prediction-service.js';

const dateQuerySchema = z.object({
  date: z.string(),
});

// Missing, repeated or non-string `date` params are reported like any other bad date.
const readDateParam = (query: Request['query']): string => {
  const parsed = dateQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new InvalidDateFormatError();
  }
  return parsed.data.date;
};

interface RegisterPredictRoutesOptions {
  app: Express;
  models: ModelStatus;
}

export const registerPredictRoutes = ({ app, models }: RegisterPredictRoutesOptions) => {
  app.get('/predict/rain/', (req: Request, res: Response) => {
    res.json(predictRain(models, readDateParam(req.query)));
  });

  app.get('/predict/precipitation/fall/', (req: Request, res: Response) => {
    res.json(predictPrecipitationFall(models, readDateParam(req.query)));
  });
};
