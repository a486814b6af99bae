import type { UserStore } from '../models/user.js';
import { LoginSchema, RegisterSchema } from '../schemas/auth-schemas.js';
import { parseInput } from '../schemas/validate.js';
import type { PublicUser, User } from '../types/auth-types.js';
import { AuthenticationError } from '../utils/errors.js';
import type { TokenService } from '../utils/jwt.js';
import { createLogger } from '../utils/logger.js';
import type { PasswordHasher } from '../utils/password.js';

const log = createLogger('auth');

export interface AuthServiceDeps {
  users: UserStore;
  hasher: PasswordHasher;
  tokens: TokenService;
}

export interface AuthService {
  register: (email: string, username: string, password: string) => Promise<PublicUser>;
  login: (usernameOrEmail: string, password: string) => Promise<string>;
}

/**
 * Strip the password hash before a user leaves the core
 */
export const toPublicUser = (user: User): PublicUser => ({
  id: user.id,
  email: user.email,
  username: user.username,
  created_at: user.created_at
});

export const createAuthService = ({ users, hasher, tokens }: AuthServiceDeps): AuthService => {
  // Checked against for unknown accounts: both login failures cost one bcrypt run
  let dummyHash: Promise<string> | undefined;

  /**
   * Register a new user
   * @returns The created user without its password hash
   * @throws ValidationError if email, username or password are malformed
   * @throws ConflictError if the email or username is taken
   */
  const register = async (email: string, username: string, password: string): Promise<PublicUser> => {
    const input = parseInput(RegisterSchema, { email, username, password });

    const passwordHash = await hasher.hash(input.password);
    const user = users.create(input.email, input.username, passwordHash);

    log.info('User registered', { userId: user.id });
    return toPublicUser(user);
  };

  /**
   * Authenticate with a username or email and a password
   * @returns A signed access token
   * @throws AuthenticationError with the same message whether the account or the password was wrong
   */
  const login = async (usernameOrEmail: string, password: string): Promise<string> => {
    const input = parseInput(LoginSchema, { username: usernameOrEmail, password });
    const user = users.findByUsernameOrEmail(input.username);

    if (!user) {
      if (!dummyHash) {
        dummyHash = hasher.hash('no-such-account');
      }
      await hasher.verify(input.password, await dummyHash);
      log.debug('Login rejected: unknown account');
      throw new AuthenticationError();
    }

    const isPasswordValid = await hasher.verify(input.password, user.password_hash);
    if (!isPasswordValid) {
      log.debug('Login rejected: wrong password', { userId: user.id });
      throw new AuthenticationError();
    }

    log.info('User logged in', { userId: user.id });
    return tokens.issue(user.id);
  };

  return { register, login };
};
