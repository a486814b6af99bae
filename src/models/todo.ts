import type { DbInstance } from '../db.js';
import type { NewTodo, Todo, TodoChanges, TodoQuery } from '../types/todo-types.js';

/**
 * Persistence for todo items. Every operation is scoped to an owner: a todo
 * belonging to someone else behaves exactly like a missing one.
 */
export interface TodoStore {
  create: (ownerId: number, todo: NewTodo) => Todo;
  list: (ownerId: number, query?: TodoQuery) => Todo[];
  count: (ownerId: number, query?: TodoQuery) => number;
  get: (ownerId: number, todoId: number) => Todo | undefined;
  update: (ownerId: number, todoId: number, changes: TodoChanges) => Todo | undefined;
  toggle: (ownerId: number, todoId: number) => Todo | undefined;
  delete: (ownerId: number, todoId: number) => boolean;
}

/**
 * Merge a partial update into a todo. Undefined fields keep their value;
 * a null description clears it.
 */
export const applyTodoChanges = (todo: Todo, changes: TodoChanges, updatedAt: string): Todo => ({
  ...todo,
  title: changes.title ?? todo.title,
  description: changes.description !== undefined ? changes.description : todo.description,
  completed: changes.completed ?? todo.completed,
  updated_at: updatedAt
});

interface TodoRow {
  id: number;
  owner_id: number;
  title: string;
  description: string | null;
  completed: number;
  created_at: string;
  updated_at: string | null;
}

const toTodo = (row: TodoRow): Todo => ({ ...row, completed: row.completed === 1 });

/**
 * Escape LIKE wildcards so a search term matches literally
 */
const escapeLike = (term: string): string => term.replace(/[\\%_]/g, (char) => `\\${char}`);

/**
 * Build the WHERE clause shared by list and count.
 * Search uses LIKE, which ignores case for ASCII letters only.
 */
const buildFilter = (ownerId: number, query: TodoQuery): { where: string; params: unknown[] } => {
  const conditions = ['owner_id = ?'];
  const params: unknown[] = [ownerId];

  if (query.completed !== undefined) {
    conditions.push('completed = ?');
    params.push(query.completed ? 1 : 0);
  }

  if (query.search) {
    const pattern = `%${escapeLike(query.search)}%`;
    conditions.push(`(title LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\')`);
    params.push(pattern, pattern);
  }

  return { where: conditions.join(' AND '), params };
};

/**
 * SQLite-backed todo store
 */
export const createSqliteTodoStore = (db: DbInstance): TodoStore => {
  const insertStmt = db.prepare<[number, string, string | null, string]>(`
    INSERT INTO todos (owner_id, title, description, completed, created_at)
    VALUES (?, ?, ?, 0, ?)
  `);
  const getStmt = db.prepare<[number, number], TodoRow>('SELECT * FROM todos WHERE id = ? AND owner_id = ?');
  const updateStmt = db.prepare<[string, string | null, number, string, number, number]>(`
    UPDATE todos SET title = ?, description = ?, completed = ?, updated_at = ?
    WHERE id = ? AND owner_id = ?
  `);
  const toggleStmt = db.prepare<[string, number, number]>(`
    UPDATE todos SET completed = 1 - completed, updated_at = ?
    WHERE id = ? AND owner_id = ?
  `);
  const deleteStmt = db.prepare<[number, number]>('DELETE FROM todos WHERE id = ? AND owner_id = ?');

  const get = (ownerId: number, todoId: number): Todo | undefined => {
    const row = getStmt.get(todoId, ownerId);
    return row ? toTodo(row) : undefined;
  };

  const create = (ownerId: number, todo: NewTodo): Todo => {
    const result = insertStmt.run(ownerId, todo.title, todo.description ?? null, new Date().toISOString());
    const created = get(ownerId, Number(result.lastInsertRowid));
    if (!created) {
      throw new Error(`Todo ${String(result.lastInsertRowid)} vanished after insert`);
    }
    return created;
  };

  const list = (ownerId: number, query: TodoQuery = {}): Todo[] => {
    const { where, params } = buildFilter(ownerId, query);
    let sql = `SELECT * FROM todos WHERE ${where} ORDER BY id`;

    if (query.limit !== undefined || query.offset !== undefined) {
      sql += ' LIMIT ? OFFSET ?';
      params.push(query.limit ?? -1, query.offset ?? 0);
    }

    return db.prepare<unknown[], TodoRow>(sql).all(...params).map(toTodo);
  };

  const count = (ownerId: number, query: TodoQuery = {}): number => {
    const { where, params } = buildFilter(ownerId, query);
    const row = db.prepare<unknown[], { total: number }>(`SELECT COUNT(*) AS total FROM todos WHERE ${where}`).get(...params);
    return row?.total ?? 0;
  };

  // Read and write in one transaction
  const update = db.transaction((ownerId: number, todoId: number, changes: TodoChanges): Todo | undefined => {
    const current = get(ownerId, todoId);
    if (!current) {
      return undefined;
    }

    const updatedAt = new Date().toISOString();
    const next = applyTodoChanges(current, changes, updatedAt);
    updateStmt.run(next.title, next.description, next.completed ? 1 : 0, updatedAt, todoId, ownerId);
    return next;
  });

  const toggle = db.transaction((ownerId: number, todoId: number): Todo | undefined => {
    const result = toggleStmt.run(new Date().toISOString(), todoId, ownerId);
    return result.changes > 0 ? get(ownerId, todoId) : undefined;
  });

  const remove = (ownerId: number, todoId: number): boolean => {
    return deleteStmt.run(todoId, ownerId).changes > 0;
  };

  return {
    create,
    list,
    count,
    get,
    update: (ownerId, todoId, changes) => update(ownerId, todoId, changes),
    toggle: (ownerId, todoId) => toggle(ownerId, todoId),
    delete: remove
  };
};
