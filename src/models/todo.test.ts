import { describe, it, expect, beforeEach } from 'vitest';
import { openDatabase } from '../db.js';
import { createMemoryTodoStore, createMemoryUserStore } from './memory-store.js';
import { createSqliteTodoStore } from './todo.js';
import type { TodoStore } from './todo.js';
import { createSqliteUserStore } from './user.js';
import type { UserStore } from './user.js';

interface Stores {
  users: UserStore;
  todos: TodoStore;
}

const implementations: Array<[string, () => Stores]> = [
  ['sqlite', () => {
    const db = openDatabase(':memory:');
    return { users: createSqliteUserStore(db), todos: createSqliteTodoStore(db) };
  }],
  ['memory', () => ({ users: createMemoryUserStore(), todos: createMemoryTodoStore() })]
];

describe.each(implementations)('%s todo store', (_name, createStores) => {
  let todos: TodoStore;
  let alice: number;
  let bob: number;

  beforeEach(() => {
    const stores = createStores();
    todos = stores.todos;
    alice = stores.users.create('a@x.com', 'alice', 'hash-a').id;
    bob = stores.users.create('b@x.com', 'bob', 'hash-b').id;
  });

  describe('create', () => {
    it('should create an incomplete todo owned by the caller', () => {
      const todo = todos.create(alice, { title: 'buy milk' });

      expect(todo).toMatchObject({
        owner_id: alice,
        title: 'buy milk',
        description: null,
        completed: false,
        updated_at: null
      });
      expect(todo.id).toBeGreaterThan(0);
    });

    it('should keep the description', () => {
      expect(todos.create(alice, { title: 'buy milk', description: 'semi-skimmed' }).description).toBe('semi-skimmed');
    });
  });

  describe('list and count', () => {
    it('should return only the owner\'s todos in insertion order', () => {
      todos.create(alice, { title: 'first' });
      todos.create(bob, { title: 'not mine' });
      todos.create(alice, { title: 'second' });

      expect(todos.list(alice).map((todo) => todo.title)).toEqual(['first', 'second']);
      expect(todos.count(alice)).toBe(2);
      expect(todos.count(bob)).toBe(1);
    });

    it('should filter by completion', () => {
      const done = todos.create(alice, { title: 'done' });
      todos.create(alice, { title: 'open' });
      todos.update(alice, done.id, { completed: true });

      expect(todos.list(alice, { completed: true }).map((todo) => todo.title)).toEqual(['done']);
      expect(todos.list(alice, { completed: false }).map((todo) => todo.title)).toEqual(['open']);
      expect(todos.count(alice, { completed: true })).toBe(1);
    });

    it('should search title and description case-insensitively', () => {
      todos.create(alice, { title: 'buy milk' });
      todos.create(alice, { title: 'groceries', description: 'Milk and eggs' });
      todos.create(alice, { title: 'walk dog' });

      expect(todos.list(alice, { search: 'MILK' }).map((todo) => todo.title)).toEqual(['buy milk', 'groceries']);
      expect(todos.count(alice, { search: 'milk' })).toBe(2);
    });

    it('should ignore case for ASCII letters only', () => {
      todos.create(alice, { title: 'Éclair recipe' });

      expect(todos.list(alice, { search: 'ÉCLAIR' }).map((todo) => todo.title)).toEqual(['Éclair recipe']);
      expect(todos.list(alice, { search: 'éclair' })).toEqual([]);
    });

    it('should treat search wildcards literally', () => {
      todos.create(alice, { title: '100% done' });
      todos.create(alice, { title: 'nothing here' });

      expect(todos.list(alice, { search: '%' }).map((todo) => todo.title)).toEqual(['100% done']);
      expect(todos.list(alice, { search: '_' })).toEqual([]);
    });

    it('should page with limit and offset', () => {
      todos.create(alice, { title: 'one' });
      todos.create(alice, { title: 'two' });
      todos.create(alice, { title: 'three' });

      expect(todos.list(alice, { limit: 2, offset: 1 }).map((todo) => todo.title)).toEqual(['two', 'three']);
      expect(todos.list(alice, { limit: 1 }).map((todo) => todo.title)).toEqual(['one']);
      expect(todos.count(alice, { limit: 1 })).toBe(3);
    });
  });

  describe('get', () => {
    it('should return the owner\'s todo', () => {
      const created = todos.create(alice, { title: 'buy milk' });

      expect(todos.get(alice, created.id)).toEqual(created);
    });

    it('should hide another owner\'s todo', () => {
      const created = todos.create(alice, { title: 'buy milk' });

      expect(todos.get(bob, created.id)).toBeUndefined();
    });

    it('should return undefined for a missing todo', () => {
      expect(todos.get(alice, 99999)).toBeUndefined();
    });
  });

  describe('update', () => {
    it('should change only the supplied fields', () => {
      const created = todos.create(alice, { title: 'original', description: 'keep me' });

      const updated = todos.update(alice, created.id, { title: 'renamed' });

      expect(updated).toMatchObject({ title: 'renamed', description: 'keep me', completed: false });
      expect(updated?.updated_at).not.toBeNull();
      expect(todos.get(alice, created.id)).toEqual(updated);
    });

    it('should clear the description with null', () => {
      const created = todos.create(alice, { title: 'task', description: 'details' });

      expect(todos.update(alice, created.id, { description: null })?.description).toBeNull();
    });

    it('should not touch another owner\'s todo', () => {
      const created = todos.create(alice, { title: 'buy milk' });

      expect(todos.update(bob, created.id, { title: 'hijacked' })).toBeUndefined();
      expect(todos.get(alice, created.id)?.title).toBe('buy milk');
    });
  });

  describe('toggle', () => {
    it('should flip completion each time', () => {
      const created = todos.create(alice, { title: 'buy milk' });

      expect(todos.toggle(alice, created.id)?.completed).toBe(true);
      expect(todos.toggle(alice, created.id)?.completed).toBe(false);
    });

    it('should not toggle another owner\'s todo', () => {
      const created = todos.create(alice, { title: 'buy milk' });

      expect(todos.toggle(bob, created.id)).toBeUndefined();
      expect(todos.get(alice, created.id)?.completed).toBe(false);
    });
  });

  describe('delete', () => {
    it('should delete the owner\'s todo', () => {
      const created = todos.create(alice, { title: 'buy milk' });

      expect(todos.delete(alice, created.id)).toBe(true);
      expect(todos.get(alice, created.id)).toBeUndefined();
    });

    it('should refuse to delete another owner\'s todo', () => {
      const created = todos.create(alice, { title: 'buy milk' });

      expect(todos.delete(bob, created.id)).toBe(false);
      expect(todos.get(alice, created.id)).toBeDefined();
    });

    it('should return false for a missing todo', () => {
      expect(todos.delete(alice, 99999)).toBe(false);
    });
  });
});
