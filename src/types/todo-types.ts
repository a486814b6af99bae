/**
 * Todo item owned by a single user
 */
export interface Todo {
  id: number;
  owner_id: number;
  title: string;
  description: string | null;
  completed: boolean;
  created_at: string;
  updated_at: string | null;
}

/**
 * Fields accepted when creating a todo
 */
export interface NewTodo {
  title: string;
  description?: string | null;
}

/**
 * Partial update; fields left undefined keep their current value
 */
export interface TodoChanges {
  title?: string;
  description?: string | null;
  completed?: boolean;
}

/**
 * Filters and paging for listing a user's todos
 */
export interface TodoQuery {
  completed?: boolean;
  search?: string;
  limit?: number;
  offset?: number;
}

/**
 * One page of a user's todos
 */
export interface TodoListResponse {
  todos: Todo[];
  total: number;
  page: number;
  per_page: number;
}
