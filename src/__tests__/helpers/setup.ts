/**
 * Jest Test Setup
 * Global test configuration and setup
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.JINA_API_KEY = process.env.JINA_API_KEY || 'test-secret';
process.env.CRAWL_MAX_ATTEMPTS = '3';
process.env.RATE_LIMIT_ENABLED = 'true';
process.env.RATE_LIMIT_MAX_REQUESTS = '100';

// Suppress console logs during tests (optional, uncomment if needed)
// global.console = {
//   ...console,
//   log: jest.fn(),
//   debug: jest.fn(),
//   info: jest.fn(),
//   warn: jest.fn(),
//   error: jest.fn(),
// };
