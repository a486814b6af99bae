import type { UnauthenticatedError } from '../utils/errors.js';

/**
 * User record as stored by the credential store
 */
export interface User {
  id: number;
  email: string;
  username: string;
  password_hash: string;
  created_at: string;
}

/**
 * User data safe to return to clients
 */
export type PublicUser = Omit<User, 'password_hash'>;

/**
 * Claims carried by an access token
 */
export interface AccessTokenClaims {
  /** User id as a decimal string */
  sub: string;
  iat: number;
  exp: number;
}

/**
 * Registration request payload
 */
export interface RegisterRequest {
  email: string;
  username: string;
  password: string;
}

/**
 * Login request payload. `username` may also hold the email address.
 */
export interface LoginRequest {
  username: string;
  password: string;
}

/**
 * Response returned after a successful login
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
}

/**
 * Outcome of resolving the identity behind an Authorization header
 */
export type IdentityResult =
  | { ok: true; user: PublicUser }
  | { ok: false; error: UnauthenticatedError };
