/**
 * Vitest setup file for global test configuration
 * Runs before each test file
 */

// Mock environment variables for testing
Object.assign(process.env, {
  NODE_ENV: 'test',
  LOG_LEVEL: 'error' // Reduce log noise in tests
});

beforeEach(() => {
  // Silence console output; tests that assert on logging spy again
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'debug').mockImplementation(() => undefined);
});

afterEach(() => {
  // Restore original console methods and clear timers between tests
  vi.restoreAllMocks();
  vi.useRealTimers();
});
