// Todo routes. Every handler runs behind requireAuth and only ever sees the caller's own todos.

import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { AppContext } from '../context.js';
import { currentUser, requireAuth } from '../middleware/auth-middleware.js';
import { TodoIdSchema } from '../schemas/todo-schemas.js';
import type { CreateTodoInput } from '../schemas/todo-schemas.js';
import { parseInput } from '../schemas/validate.js';

export const createTodoRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const { todoService } = ctx;

  router.use(requireAuth(ctx));

  // List todos: ?page=1&per_page=10&completed=true&search=milk
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      res.json(todoService.list(user.id, req.query));
    } catch (error) {
      next(error);
    }
  });

  // Create a todo: { title, description? }
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const { title, description } = req.body as Partial<CreateTodoInput>;

      res.status(201).json(todoService.create(user.id, title ?? '', description));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:todoId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const todoId = parseInput(TodoIdSchema, req.params.todoId);

      res.json(todoService.get(user.id, todoId));
    } catch (error) {
      next(error);
    }
  });

  // Partial update: { title?, description?, completed? }
  router.put('/:todoId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const todoId = parseInput(TodoIdSchema, req.params.todoId);

      res.json(todoService.update(user.id, todoId, req.body));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:todoId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const todoId = parseInput(TodoIdSchema, req.params.todoId);

      todoService.delete(user.id, todoId);
      res.json({ message: 'Todo deleted successfully' });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:todoId/toggle', (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = currentUser(req);
      const todoId = parseInput(TodoIdSchema, req.params.todoId);

      res.json(todoService.toggle(user.id, todoId));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
