// In-process stores with the same contract as the SQLite ones.
// Each call runs to completion on the event loop, which makes check-and-insert atomic.

import type { User } from '../types/auth-types.js';
import type { NewTodo, Todo, TodoChanges, TodoQuery } from '../types/todo-types.js';
import { ConflictError } from '../utils/errors.js';
import { applyTodoChanges } from './todo.js';
import type { TodoStore } from './todo.js';
import { EMAIL_TAKEN, USERNAME_TAKEN, normalizeEmail } from './user.js';
import type { UserStore } from './user.js';

export const createMemoryUserStore = (): UserStore => {
  const users = new Map<number, User>();
  let nextId = 1;

  const create = (email: string, username: string, passwordHash: string): User => {
    const normalized = normalizeEmail(email);
    const existing = [...users.values()];

    if (existing.some((user) => user.email === normalized)) {
      throw new ConflictError(EMAIL_TAKEN);
    }
    if (existing.some((user) => user.username === username)) {
      throw new ConflictError(USERNAME_TAKEN);
    }

    const user: User = {
      id: nextId++,
      email: normalized,
      username,
      password_hash: passwordHash,
      created_at: new Date().toISOString()
    };
    users.set(user.id, user);
    return { ...user };
  };

  const findByUsernameOrEmail = (key: string): User | undefined => {
    const email = normalizeEmail(key);
    const user = [...users.values()].find((candidate) => candidate.username === key || candidate.email === email);
    return user ? { ...user } : undefined;
  };

  const findById = (id: number): User | undefined => {
    const user = users.get(id);
    return user ? { ...user } : undefined;
  };

  return { create, findByUsernameOrEmail, findById };
};

/**
 * Lower-case ASCII letters only, the folding SQLite's LIKE applies
 */
const foldAscii = (text: string): string => text.replace(/[A-Z]/g, (char) => char.toLowerCase());

const matchesQuery = (todo: Todo, query: TodoQuery): boolean => {
  if (query.completed !== undefined && todo.completed !== query.completed) {
    return false;
  }

  if (query.search) {
    const term = foldAscii(query.search);
    const inTitle = foldAscii(todo.title).includes(term);
    const inDescription = todo.description !== null && foldAscii(todo.description).includes(term);
    return inTitle || inDescription;
  }

  return true;
};

export const createMemoryTodoStore = (): TodoStore => {
  // Map iteration order is insertion order, which doubles as id order
  const todos = new Map<number, Todo>();
  let nextId = 1;

  const owned = (ownerId: number, todoId: number): Todo | undefined => {
    const todo = todos.get(todoId);
    return todo && todo.owner_id === ownerId ? todo : undefined;
  };

  const filtered = (ownerId: number, query: TodoQuery): Todo[] => {
    return [...todos.values()].filter((todo) => todo.owner_id === ownerId && matchesQuery(todo, query));
  };

  const create = (ownerId: number, input: NewTodo): Todo => {
    const todo: Todo = {
      id: nextId++,
      owner_id: ownerId,
      title: input.title,
      description: input.description ?? null,
      completed: false,
      created_at: new Date().toISOString(),
      updated_at: null
    };
    todos.set(todo.id, todo);
    return { ...todo };
  };

  const list = (ownerId: number, query: TodoQuery = {}): Todo[] => {
    const offset = query.offset ?? 0;
    const end = query.limit !== undefined ? offset + query.limit : undefined;
    return filtered(ownerId, query).slice(offset, end).map((todo) => ({ ...todo }));
  };

  const count = (ownerId: number, query: TodoQuery = {}): number => filtered(ownerId, query).length;

  const get = (ownerId: number, todoId: number): Todo | undefined => {
    const todo = owned(ownerId, todoId);
    return todo ? { ...todo } : undefined;
  };

  const update = (ownerId: number, todoId: number, changes: TodoChanges): Todo | undefined => {
    const todo = owned(ownerId, todoId);
    if (!todo) {
      return undefined;
    }

    const next = applyTodoChanges(todo, changes, new Date().toISOString());
    todos.set(todoId, next);
    return { ...next };
  };

  const toggle = (ownerId: number, todoId: number): Todo | undefined => {
    const todo = owned(ownerId, todoId);
    return todo ? update(ownerId, todoId, { completed: !todo.completed }) : undefined;
  };

  const remove = (ownerId: number, todoId: number): boolean => {
    return owned(ownerId, todoId) ? todos.delete(todoId) : false;
  };

  return { create, list, count, get, update, toggle, delete: remove };
};
