import type { TodoStore } from '../models/todo.js';
import { CreateTodoSchema, ListTodosQuerySchema, UpdateTodoSchema } from '../schemas/todo-schemas.js';
import { parseInput } from '../schemas/validate.js';
import type { Todo, TodoChanges, TodoListResponse } from '../types/todo-types.js';
import { NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('todos');

export const TODO_NOT_FOUND = 'Todo not found';

export interface ListTodosOptions {
  page?: number;
  per_page?: number;
  completed?: boolean;
  search?: string;
}

export interface TodoService {
  create: (ownerId: number, title: string, description?: string | null) => Todo;
  /** Accepts typed options or a raw query string object; both are validated */
  list: (ownerId: number, options?: ListTodosOptions | Record<string, unknown>) => TodoListResponse;
  get: (ownerId: number, todoId: number) => Todo;
  update: (ownerId: number, todoId: number, changes: TodoChanges) => Todo;
  toggle: (ownerId: number, todoId: number) => Todo;
  delete: (ownerId: number, todoId: number) => void;
}

/**
 * Turn a store miss into the one error callers see for both
 * "does not exist" and "belongs to someone else"
 */
const found = (todo: Todo | undefined): Todo => {
  if (!todo) {
    throw new NotFoundError(TODO_NOT_FOUND);
  }
  return todo;
};

/**
 * Todo operations scoped to the owner resolved for the current request
 */
export const createTodoService = (store: TodoStore): TodoService => {
  /**
   * @throws ValidationError if the title is empty or too long
   */
  const create = (ownerId: number, title: string, description?: string | null): Todo => {
    const input = parseInput(CreateTodoSchema, { title, description });
    const todo = store.create(ownerId, input);

    log.debug('Todo created', { ownerId, todoId: todo.id });
    return todo;
  };

  const list = (ownerId: number, options: ListTodosOptions | Record<string, unknown> = {}): TodoListResponse => {
    const query = parseInput(ListTodosQuerySchema, options);
    const filter = { completed: query.completed, search: query.search };

    const todos = store.list(ownerId, {
      ...filter,
      limit: query.per_page,
      offset: (query.page - 1) * query.per_page
    });

    return {
      todos,
      total: store.count(ownerId, filter),
      page: query.page,
      per_page: query.per_page
    };
  };

  const get = (ownerId: number, todoId: number): Todo => {
    return found(store.get(ownerId, todoId));
  };

  /**
   * Apply a partial update; fields not supplied keep their value
   * @throws ValidationError if a supplied field is invalid
   */
  const update = (ownerId: number, todoId: number, changes: TodoChanges): Todo => {
    const input = parseInput(UpdateTodoSchema, changes);
    const todo = found(store.update(ownerId, todoId, input));

    log.debug('Todo updated', { ownerId, todoId });
    return todo;
  };

  const toggle = (ownerId: number, todoId: number): Todo => {
    return found(store.toggle(ownerId, todoId));
  };

  const remove = (ownerId: number, todoId: number): void => {
    if (!store.delete(ownerId, todoId)) {
      throw new NotFoundError(TODO_NOT_FOUND);
    }
    log.debug('Todo deleted', { ownerId, todoId });
  };

  return { create, list, get, update, toggle, delete: remove };
};
