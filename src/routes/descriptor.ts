import type { Express, Request, Response } from 'express';

export const SERVICE_TITLE = 'Weather Prediction API';
export const SERVICE_VERSION = '1.0.0';

export const buildDescriptor = (repositoryUrl: string) => ({
  project: `${SERVICE_TITLE} - rain and precipitation forecasts`,
  title: SERVICE_TITLE,
  version: SERVICE_VERSION,
  description:
    'The API serves two tasks: predicting rain in exactly 7 days and predicting total rain in the next 3 days.',
  objectives: [
    'Predict if it will rain exactly 7 days after the given date.',
    'Predict the cumulated precipitation (mm) for the next 3 days after the given date.',
  ],
  endpoints: [
    {
      path: '/',
      method: 'GET',
      description: 'Brief description, endpoints, inputs/outputs, repo link.',
    },
    {
      path: '/health/',
      method: 'GET',
      description: 'Health check (returns 200 and a welcome message).',
    },
    {
      path: '/predict/rain/',
      method: 'GET',
      query_params: { date: 'YYYY-MM-DD' },
      output_example: {
        input_date: '2023-01-01',
        prediction: { date: '2023-01-08', will_rain: true },
      },
    },
    {
      path: '/predict/precipitation/fall/',
      method: 'GET',
      query_params: { date: 'YYYY-MM-DD' },
      output_example: {
        input_date: '2023-01-01',
        prediction: {
          start_date: '2023-01-02',
          end_date: '2023-01-04',
          precipitation_fall: '28.2',
        },
      },
    },
  ],
  expected_input_parameters: {
    date: 'string formatted YYYY-MM-DD',
  },
  output_format_notes: {
    '/predict/rain/': {
      fields: ['input_date', 'prediction.date', 'prediction.will_rain (bool)'],
    },
    '/predict/precipitation/fall/': {
      fields: ['input_date', 'prediction.start_date', 'prediction.end_date', 'prediction.precipitation_fall (string)'],
    },
  },
  github_repo: repositoryUrl,
});

export const registerDescriptorRoute = (app: Express, repositoryUrl: string) => {
  const descriptor = buildDescriptor(repositoryUrl);
  app.get('/', (_req: Request, res: Response) => {
    res.json(descriptor);
  });
};
