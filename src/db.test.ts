import { describe, it, expect } from 'vitest';
import { openDatabase, resolveDatabasePath } from './db.js';

describe('resolveDatabasePath', () => {
  it('should strip the sqlite:/// prefix', () => {
    expect(resolveDatabasePath('sqlite:///./data/todo.db')).toBe('./data/todo.db');
    expect(resolveDatabasePath('sqlite:////var/lib/todo.db')).toBe('/var/lib/todo.db');
  });

  it('should pass plain paths through', () => {
    expect(resolveDatabasePath('./todo.db')).toBe('./todo.db');
  });

  it('should recognise in-memory databases', () => {
    expect(resolveDatabasePath(':memory:')).toBe(':memory:');
    expect(resolveDatabasePath('sqlite:///:memory:')).toBe(':memory:');
  });
});

describe('openDatabase', () => {
  it('should create the users and todos tables', () => {
    const db = openDatabase(':memory:');
    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all()
      .map((row) => row.name);

    expect(tables).toEqual(['todos', 'users']);
    db.close();
  });

  it('should enable foreign keys', () => {
    const db = openDatabase(':memory:');

    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    db.close();
  });

  it('should reject a todo whose owner does not exist', () => {
    const db = openDatabase(':memory:');
    const insert = db.prepare("INSERT INTO todos (owner_id, title, created_at) VALUES (42, 'orphan', '2026-01-01T00:00:00.000Z')");

    expect(() => insert.run()).toThrow(/FOREIGN KEY constraint failed/);
    db.close();
  });
});
