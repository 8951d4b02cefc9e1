import path from 'node:path';

const loadRuntime = async () => {
  vi.resetModules();
  return import('../src/server/runtime.js');
};

afterEach(() => {
  vi.unstubAllEnvs();
});

test('explicit model paths and repository URL override the defaults', async () => {
  vi.stubEnv('RAIN_MODEL_PATH', '/opt/models/clf.json');
  vi.stubEnv('PRECIP_MODEL_PATH', '/opt/models/reg.json');
  vi.stubEnv('GITHUB_URL', 'https://example.test/weather-api');

  const runtime = await loadRuntime();
  expect(runtime.RAIN_MODEL_PATH).toBe('/opt/models/clf.json');
  expect(runtime.PRECIP_MODEL_PATH).toBe('/opt/models/reg.json');
  expect(runtime.GITHUB_URL).toBe('https://example.test/weather-api');
});

test('MODEL_BASE_DIR moves both default model paths', async () => {
  const baseDir = path.resolve('/srv/weather-models');
  vi.stubEnv('MODEL_BASE_DIR', baseDir);
  vi.stubEnv('RAIN_MODEL_PATH', '');
  vi.stubEnv('PRECIP_MODEL_PATH', '');

  const runtime = await loadRuntime();
  expect(runtime.MODEL_BASE_DIR).toBe(baseDir);
  expect(runtime.RAIN_MODEL_PATH).toBe(path.join(baseDir, 'rain_or_not', 'rain-classifier.json'));
  expect(runtime.PRECIP_MODEL_PATH).toBe(path.join(baseDir, 'precipitation_fall', 'precipitation-regressor.json'));
});

test('falls back to the built-in defaults when nothing is set', async () => {
  vi.stubEnv('MODEL_BASE_DIR', '');
  vi.stubEnv('RAIN_MODEL_PATH', '');
  vi.stubEnv('PRECIP_MODEL_PATH', '');
  vi.stubEnv('GITHUB_URL', '');

  const runtime = await loadRuntime();
  expect(runtime.MODEL_BASE_DIR).toBe(path.resolve(process.cwd(), 'models'));
  expect(runtime.RAIN_MODEL_PATH).toBe(path.join(process.cwd(), 'models', 'rain_or_not', 'rain-classifier.json'));
  expect(runtime.GITHUB_URL).toBe(runtime.GITHUB_URL_DEFAULT);
});
