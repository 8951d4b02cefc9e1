import request from 'supertest';
import { app, models } from '../index.js';
import { GITHUB_URL } from '../src/server/runtime.js';

test('bundled artifacts load at startup', () => {
  expect(models.loadError).toBeNull();
  expect(models.rainClassifier).not.toBeNull();
  expect(models.precipitationRegressor).not.toBeNull();
});

test('GET /health/ reports ready', async () => {
  const res = await request(app).get('/health/');
  expect(res.status).toBe(200);
  expect(res.body).toBe('API is ready. Models loaded.');
  expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
});

test('GET /healthz returns healthy payload', async () => {
  const res = await request(app).get('/healthz');
  expect(res.status).toBe(200);
  expect(res.body.ok).toBe(true);
  expect(res.body.state).toBe('ready');
  expect(res.body.models).toEqual({ rain: true, precipitation: true });
});

test('GET / describes the service', async () => {
  const res = await request(app).get('/');
  expect(res.status).toBe(200);
  expect(res.body.github_repo).toBe(GITHUB_URL);
  expect(res.body.endpoints.map((endpoint: { path: string }) => endpoint.path)).toEqual([
    '/',
    '/health/',
    '/predict/rain/',
    '/predict/precipitation/fall/',
  ]);
  expect(res.body.expected_input_parameters).toEqual({ date: 'string formatted YYYY-MM-DD' });
});

test('GET /predict/rain/?date=2023-01-01 predicts rain a week later', async () => {
  const res = await request(app).get('/predict/rain/').query({ date: '2023-01-01' });
  expect(res.status).toBe(200);
  expect(res.body).toEqual({
    input_date: '2023-01-01',
    prediction: { date: '2023-01-08', will_rain: true },
  });
});

test('GET /predict/rain/?date=2023-07-01 predicts a dry day in summer', async () => {
  const res = await request(app).get('/predict/rain/').query({ date: '2023-07-01' });
  expect(res.status).toBe(200);
  expect(res.body).toEqual({
    input_date: '2023-07-01',
    prediction: { date: '2023-07-08', will_rain: false },
  });
});

test('GET /predict/precipitation/fall/?date=2023-01-01 sums the winter weekend trees', async () => {
  const res = await request(app).get('/predict/precipitation/fall/').query({ date: '2023-01-01' });
  expect(res.status).toBe(200);
  expect(res.body).toEqual({
    input_date: '2023-01-01',
    prediction: { start_date: '2023-01-02', end_date: '2023-01-04', precipitation_fall: '28.2' },
  });
});

test('GET /predict/precipitation/fall/?date=2023-07-05 uses the summer weekday leaves', async () => {
  const res = await request(app).get('/predict/precipitation/fall/').query({ date: '2023-07-05' });
  expect(res.status).toBe(200);
  expect(res.body.prediction).toEqual({
    start_date: '2023-07-06',
    end_date: '2023-07-08',
    precipitation_fall: '8.5',
  });
});

test('unknown routes return 404', async () => {
  const res = await request(app).get('/predict/snow/');
  expect(res.status).toBe(404);
  expect(res.body).toEqual({ error: 'Not found' });
});
