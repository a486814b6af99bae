import { z } from 'zod';
import { MAX_PASSWORD_BYTES } from '../utils/password.js';

const USERNAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export const RegisterSchema = z.object({
  email: z
    .string({ required_error: 'Email is required', invalid_type_error: 'Email must be a string' })
    .trim()
    .max(255, 'Email must be at most 255 characters')
    .email('Invalid email format'),
  username: z
    .string({ required_error: 'Username is required', invalid_type_error: 'Username must be a string' })
    .min(3, 'Username must be at least 3 characters long')
    .max(50, 'Username must be at most 50 characters long')
    .regex(USERNAME_PATTERN, 'Username may only contain letters, digits, ".", "_" and "-"'),
  password: z
    .string({ required_error: 'Password is required', invalid_type_error: 'Password must be a string' })
    .min(1, 'Password is required')
    .refine(
      (password) => Buffer.byteLength(password, 'utf8') <= MAX_PASSWORD_BYTES,
      `Password must be at most ${MAX_PASSWORD_BYTES} bytes long`
    )
});

export const LoginSchema = z.object({
  username: z
    .string({ required_error: 'Username is required', invalid_type_error: 'Username must be a string' })
    .min(1, 'Username is required'),
  password: z
    .string({ required_error: 'Password is required', invalid_type_error: 'Password must be a string' })
    .min(1, 'Password is required')
});

