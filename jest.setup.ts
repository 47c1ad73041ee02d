/**
 * Jest Test Setup
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

// Suppress console during tests
beforeAll(() => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'info').mockImplementation(() => {});
});

afterAll(() => {
  jest.restoreAllMocks();
});
