// Jest setup file, executed before each test file

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent'; // Suppress logs during tests

jest.setTimeout(10000);
