/**
 * Test setup file - runs before all tests
 * Sets up environment variables needed for testing
 */
import { setLogLevel } from './utils/logger.js';

process.env.SECRET_KEY = 'test-secret-key-for-jwt-tokens';

// Use an in-memory database
process.env.DATABASE_URL = ':memory:';

process.env.NODE_ENV = 'test';

// Keep test output clean
process.env.LOG_LEVEL = 'silent';
setLogLevel('silent');
