import bcrypt from 'bcrypt';
import { ValidationError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('password');

/**
 * Minimum bcrypt cost, enforced whatever the configuration says
 */
export const MIN_BCRYPT_ROUNDS = 10;

/**
 * bcrypt only reads the first 72 bytes of its input
 */
export const MAX_PASSWORD_BYTES = 72;

const exceedsBcryptInput = (plain: string): boolean => Buffer.byteLength(plain, 'utf8') > MAX_PASSWORD_BYTES;

const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export interface PasswordHasher {
  hash: (plain: string) => Promise<string>;
  verify: (plain: string, hash: string) => Promise<boolean>;
}

/**
 * Create a salted bcrypt hasher.
 * @param rounds - Configured cost; raised to MIN_BCRYPT_ROUNDS when lower
 */
export const createPasswordHasher = (rounds: number = MIN_BCRYPT_ROUNDS): PasswordHasher => {
  const cost = Math.max(rounds, MIN_BCRYPT_ROUNDS);

  /**
   * Hash a plain text password with a fresh salt
   * @throws ValidationError if the password is longer than bcrypt can read
   */
  const hash = async (plain: string): Promise<string> => {
    if (exceedsBcryptInput(plain)) {
      throw new ValidationError(`Password must be at most ${MAX_PASSWORD_BYTES} bytes long`);
    }
    return bcrypt.hash(plain, cost);
  };

  /**
   * Compare a plain text password with a stored hash.
   * A malformed hash or an over-long password is a failed verification, not an error.
   */
  const verify = async (plain: string, hash: string): Promise<boolean> => {
    // bcrypt would compare only the first 72 bytes
    if (exceedsBcryptInput(plain) || !BCRYPT_HASH_PATTERN.test(hash)) {
      return false;
    }

    try {
      return await bcrypt.compare(plain, hash);
    } catch (error) {
      log.warn('Password comparison failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  };

  return { hash, verify };
};
