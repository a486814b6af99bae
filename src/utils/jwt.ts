import jwt from 'jsonwebtoken';
import type { AppConfig } from '../config.js';
import type { AccessTokenClaims } from '../types/auth-types.js';
import { ConfigError, ExpiredTokenError, InvalidTokenError } from './errors.js';

export type TokenSettings = Pick<AppConfig, 'secretKey' | 'algorithm' | 'accessTokenTtlMinutes'>;

export interface TokenService {
  /** Lifetime of an issued token, in seconds */
  readonly ttlSeconds: number;
  issue: (userId: number, issuedAt?: Date) => string;
  validate: (token: string, now?: Date) => number;
}

const SUBJECT_PATTERN = /^[1-9]\d*$/;

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * Pull the user id out of verified claims
 * @throws InvalidTokenError if the payload is not an access token we issued
 */
const subjectOf = (decoded: string | jwt.JwtPayload): number => {
  if (typeof decoded === 'string') {
    throw new InvalidTokenError();
  }

  if (typeof decoded.exp !== 'number' || typeof decoded.sub !== 'string' || !SUBJECT_PATTERN.test(decoded.sub)) {
    throw new InvalidTokenError();
  }

  return Number(decoded.sub);
};

/**
 * Create the access token service.
 * The secret is fixed for the life of the service; changing it invalidates
 * every token issued before.
 * @throws ConfigError if the secret is empty
 */
export const createTokenService = (settings: TokenSettings): TokenService => {
  const { secretKey, algorithm } = settings;

  if (!secretKey) {
    throw new ConfigError(['SECRET_KEY: must not be empty']);
  }

  const ttlSeconds = settings.accessTokenTtlMinutes * 60;

  /**
   * Sign a token for a user
   * @param userId - Subject of the token
   * @param issuedAt - Issue time; expiry is issuedAt + TTL
   * @returns A signed JWT string
   */
  const issue = (userId: number, issuedAt: Date = new Date()): string => {
    const iat = toSeconds(issuedAt);
    const claims: AccessTokenClaims = {
      sub: String(userId),
      iat,
      exp: iat + ttlSeconds
    };

    return jwt.sign(claims, secretKey, { algorithm });
  };

  /**
   * Verify a token and return the user id it was issued for.
   * Expiry is compared against `now` with no leeway.
   * @throws ExpiredTokenError if now >= exp
   * @throws InvalidTokenError for any other failure: signature, algorithm, encoding or claims
   */
  const validate = (token: string, now: Date = new Date()): number => {
    let decoded: string | jwt.JwtPayload;

    try {
      decoded = jwt.verify(token, secretKey, {
        algorithms: [algorithm],
        clockTimestamp: toSeconds(now)
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new ExpiredTokenError();
      }
      // Undecodable segments surface as a bare SyntaxError, not a JsonWebTokenError
      throw new InvalidTokenError();
    }

    return subjectOf(decoded);
  };

  return { ttlSeconds, issue, validate };
};
