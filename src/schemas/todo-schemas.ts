import { z } from 'zod';

const TitleSchema = z
  .string({ required_error: 'Title is required', invalid_type_error: 'Title must be a string' })
  .trim()
  .min(1, 'Title is required')
  .max(200, 'Title must be at most 200 characters');

const DescriptionSchema = z
  .string({ invalid_type_error: 'Description must be a string' })
  .max(1000, 'Description must be at most 1000 characters')
  .nullable()
  .optional();

export const CreateTodoSchema = z.object({
  title: TitleSchema,
  description: DescriptionSchema
});

export const UpdateTodoSchema = z.object({
  title: TitleSchema.optional(),
  description: DescriptionSchema,
  completed: z.boolean({ invalid_type_error: 'Completed must be a boolean' }).optional()
});

/**
 * Query-string booleans arrive as text
 */
const QueryBoolean = z.preprocess(
  (value) => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean({ invalid_type_error: 'completed must be "true" or "false"' })
);

export const ListTodosQuerySchema = z.object({
  page: z.coerce
    .number({ invalid_type_error: 'page must be an integer' })
    .int('page must be an integer')
    .min(1, 'page must be at least 1')
    .default(1),
  per_page: z.coerce
    .number({ invalid_type_error: 'per_page must be an integer' })
    .int('per_page must be an integer')
    .min(1, 'per_page must be at least 1')
    .max(100, 'per_page must be at most 100')
    .default(10),
  completed: QueryBoolean.optional(),
  search: z.string().trim().min(1).optional().catch(undefined)
});

export const TodoIdSchema = z.coerce
  .number({ invalid_type_error: 'Todo id must be a positive integer' })
  .int('Todo id must be a positive integer')
  .positive('Todo id must be a positive integer');

export type CreateTodoInput = z.infer<typeof CreateTodoSchema>;
