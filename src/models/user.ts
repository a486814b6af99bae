import Database from 'better-sqlite3';
import type { DbInstance } from '../db.js';
import type { User } from '../types/auth-types.js';
import { ConflictError } from '../utils/errors.js';

export const EMAIL_TAKEN = 'Email already registered';
export const USERNAME_TAKEN = 'Username already taken';

/**
 * Persistence for user identities. Implementations must reject a duplicate
 * email or username atomically and finish every write before returning.
 */
export interface UserStore {
  create: (email: string, username: string, passwordHash: string) => User;
  findByUsernameOrEmail: (key: string) => User | undefined;
  findById: (id: number) => User | undefined;
}

/**
 * Emails are stored and compared trimmed and lower-cased
 */
export const normalizeEmail = (email: string): string => email.trim().toLowerCase();

/**
 * SQLite-backed user store
 */
export const createSqliteUserStore = (db: DbInstance): UserStore => {
  const insertStmt = db.prepare<[string, string, string, string]>(`
    INSERT INTO users (email, username, password_hash, created_at)
    VALUES (?, ?, ?, ?)
  `);
  const findByIdStmt = db.prepare<[number], User>('SELECT * FROM users WHERE id = ?');
  const findByKeyStmt = db.prepare<[string, string], User>(
    'SELECT * FROM users WHERE username = ? OR email = ? ORDER BY id LIMIT 1'
  );

  /**
   * Create a new user
   * @throws ConflictError if the email or username already exists
   */
  const create = (email: string, username: string, passwordHash: string): User => {
    try {
      const result = insertStmt.run(normalizeEmail(email), username, passwordHash, new Date().toISOString());

      // Fetch the created user
      const user = findByIdStmt.get(Number(result.lastInsertRowid));
      if (!user) {
        throw new Error(`User ${String(result.lastInsertRowid)} vanished after insert`);
      }
      return user;
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new ConflictError(error.message.includes('users.email') ? EMAIL_TAKEN : USERNAME_TAKEN);
      }
      throw error;
    }
  };

  /**
   * Find a user whose username or email equals the given key
   */
  const findByUsernameOrEmail = (key: string): User | undefined => {
    return findByKeyStmt.get(key, normalizeEmail(key));
  };

  const findById = (id: number): User | undefined => {
    return findByIdStmt.get(id);
  };

  return { create, findByUsernameOrEmail, findById };
};
