import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';

/**
 * Export type for the database instance
 */
export type DbInstance = Database.Database;

export const MEMORY_DATABASE = ':memory:';

/**
 * Turn a DATABASE_URL into a better-sqlite3 file name.
 * Accepts `sqlite:///relative/or/absolute/path`, a plain path, or `:memory:`.
 */
export const resolveDatabasePath = (url: string): string => {
  if (url === MEMORY_DATABASE || url === 'sqlite://:memory:' || url === 'sqlite:///:memory:') {
    return MEMORY_DATABASE;
  }

  if (url.startsWith('sqlite:///')) {
    return url.slice('sqlite:///'.length);
  }

  if (url.startsWith('sqlite://')) {
    return url.slice('sqlite://'.length);
  }

  return url;
};

/**
 * Ensure the database directory exists
 */
const ensureDbDirectory = (dbPath: string): void => {
  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
};

/**
 * Create the database schema
 */
export const createSchema = (db: DbInstance): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      email TEXT NOT NULL,
      username TEXT NOT NULL,
      password_hash TEXT NOT NULL,
      created_at TEXT NOT NULL
    );
  `);

  // Unique indexes enforce one account per email and per username
  db.exec(`
    CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON users(email);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_users_username ON users(username);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS todos (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      owner_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      description TEXT,
      completed INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_todos_owner ON todos(owner_id);
  `);
};

/**
 * Open (and if needed create) the SQLite database behind a DATABASE_URL
 */
export const openDatabase = (url: string): DbInstance => {
  const dbPath = resolveDatabasePath(url);

  if (dbPath !== MEMORY_DATABASE) {
    ensureDbDirectory(dbPath);
  }

  const db = new Database(dbPath);

  // Enable foreign keys
  db.pragma('foreign_keys = ON');

  if (dbPath !== MEMORY_DATABASE) {
    db.pragma('journal_mode = WAL');
  }

  createSchema(db);

  return db;
};
