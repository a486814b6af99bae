import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import type { AppContext } from '../context.js';
import { currentUser, requireAuth } from '../middleware/auth-middleware.js';
import type { LoginRequest, RegisterRequest, TokenResponse } from '../types/auth-types.js';
import { ValidationError } from '../utils/errors.js';

export const createAuthRoutes = (ctx: AppContext): Router => {
  const router = Router();

  // Rate limiter for login endpoint - per IP, one-minute window
  const loginRateLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: ctx.config.loginRateLimit,
    message: {
      error: 'Too many login attempts',
      message: 'Please try again later'
    },
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false // Disable the `X-RateLimit-*` headers
  });

  /**
   * POST /auth/register
   * Request body: { email, username, password }
   * Response: 201 { id, email, username, created_at }
   */
  router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { email, username, password } = req.body as Partial<RegisterRequest>;

      if (!email || !username || !password) {
        throw new ValidationError('Email, username and password are required');
      }

      const user = await ctx.auth.register(email, username, password);

      res.status(201).json(user);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /auth/login
   * Request body (JSON or form): { username, password }; username may be the email
   * Response: { access_token, token_type: 'bearer' }
   */
  router.post('/login', loginRateLimiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username, password } = req.body as Partial<LoginRequest>;

      if (!username || !password) {
        throw new ValidationError('Username and password are required');
      }

      const token = await ctx.auth.login(username, password);
      const body: TokenResponse = {
        access_token: token,
        token_type: 'bearer'
      };

      res.status(200).json(body);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /auth/me
   * Requires: Authorization: Bearer <token>
   * Response: { id, email, username, created_at }
   */
  router.get('/me', requireAuth(ctx), (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(currentUser(req));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
