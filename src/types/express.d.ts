import type { PublicUser } from './auth-types.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by requireAuth for the lifetime of one request */
      user?: PublicUser;
    }
  }
}
