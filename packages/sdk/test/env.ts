/**
 * Test environment setup - sets up environment variables for testing
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

export {};
