// Wires configuration, stores and services together once per process (or per test)

import type { AppConfig } from './config.js';
import { openDatabase } from './db.js';
import type { DbInstance } from './db.js';
import { createSqliteTodoStore } from './models/todo.js';
import type { TodoStore } from './models/todo.js';
import { createSqliteUserStore } from './models/user.js';
import type { UserStore } from './models/user.js';
import { createAuthService } from './services/auth-service.js';
import type { AuthService } from './services/auth-service.js';
import { createTodoService } from './services/todo-service.js';
import type { TodoService } from './services/todo-service.js';
import { createTokenService } from './utils/jwt.js';
import type { TokenService } from './utils/jwt.js';
import { createPasswordHasher } from './utils/password.js';
import type { PasswordHasher } from './utils/password.js';

export interface Stores {
  users: UserStore;
  todos: TodoStore;
}

export interface AppContext extends Stores {
  config: AppConfig;
  hasher: PasswordHasher;
  tokens: TokenService;
  auth: AuthService;
  todoService: TodoService;
  /** Release the database, if the context opened one */
  close: () => void;
}

/**
 * Build the SQLite stores over an open database
 */
export const createSqliteStores = (db: DbInstance): Stores => ({
  users: createSqliteUserStore(db),
  todos: createSqliteTodoStore(db)
});

/**
 * Create every service the app needs.
 * @param stores - Stores to use instead of opening config.databaseUrl
 * @throws ConfigError if the signing secret is unusable
 */
export const createContext = (config: AppConfig, stores?: Stores): AppContext => {
  // Token service first: a bad secret must fail before anything touches the disk
  const tokens = createTokenService(config);
  const hasher = createPasswordHasher(config.bcryptRounds);

  let db: DbInstance | undefined;
  let resolved: Stores;
  if (stores) {
    resolved = stores;
  } else {
    db = openDatabase(config.databaseUrl);
    resolved = createSqliteStores(db);
  }

  return {
    config,
    ...resolved,
    hasher,
    tokens,
    auth: createAuthService({ users: resolved.users, hasher, tokens }),
    todoService: createTodoService(resolved.todos),
    close: () => {
      db?.close();
    }
  };
};
