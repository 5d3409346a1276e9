/**
 * Jest setup file for event-search-service tests
 * This file runs before every test file
 */

// Set test environment
process.env.NODE_ENV = 'test';

// Quiet, synchronous logging: no pino-pretty worker during tests
process.env.LOG_LEVEL = 'silent';
process.env.LOG_FORMAT = 'json';

// Global test timeout
jest.setTimeout(30000);

// Reset mocks between tests
afterEach(() => {
  jest.clearAllMocks();
});
