// Shared fixtures for the test suites

import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { createContext } from './context.js';
import type { AppContext } from './context.js';
import { createMemoryTodoStore, createMemoryUserStore } from './models/memory-store.js';

export const TEST_SECRET = 'test-secret-key-for-jwt-tokens';

/**
 * Configuration for tests: in-memory SQLite, silent logs, overridable per test
 */
export const createTestConfig = (overrides: Record<string, string> = {}): AppConfig => {
  return loadConfig({
    SECRET_KEY: TEST_SECRET,
    DATABASE_URL: ':memory:',
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    ...overrides
  });
};

/**
 * Context over a fresh in-memory SQLite database
 */
export const createTestContext = (overrides: Record<string, string> = {}): AppContext => {
  return createContext(createTestConfig(overrides));
};

/**
 * Context over the plain in-memory stores
 */
export const createMemoryContext = (overrides: Record<string, string> = {}): AppContext => {
  return createContext(createTestConfig(overrides), {
    users: createMemoryUserStore(),
    todos: createMemoryTodoStore()
  });
};
