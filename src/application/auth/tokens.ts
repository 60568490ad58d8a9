import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { AuthenticationError } from '../errors.js';
import type { AuthConfig } from '../../infra/config.js';

export type TokenType = 'access' | 'refresh';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Claims beyond the reserved ones. Reserved claims always win over these.
 */
export interface ExtraClaims {
  is_admin?: boolean;
  email?: string;
}

export interface TokenClaims extends ExtraClaims {
  sub: string;
  type: TokenType;
  iat: number;
  exp: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}

/** Signature, algorithm or token-type mismatch. */
export class InvalidTokenError extends AuthenticationError {
  constructor(message = 'Invalid token') {
    super(message);
    this.name = 'InvalidTokenError';
  }
}

export class ExpiredTokenError extends AuthenticationError {
  constructor(message = 'Token expired') {
    super(message);
    this.name = 'ExpiredTokenError';
  }
}

/** Not a compact JWS, or claims of the wrong shape. */
export class MalformedTokenError extends AuthenticationError {
  constructor(message = 'Malformed token') {
    super(message);
    this.name = 'MalformedTokenError';
  }
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  type: z.enum(['access', 'refresh']),
  iat: z.number().int(),
  exp: z.number().int(),
  is_admin: z.boolean().optional(),
  email: z.string().optional(),
});

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_DAY = 24 * 60 * 60;

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Issues and verifies the stateless access/refresh token pair.
 */
export class TokenService {
  constructor(
    private config: AuthConfig,
    private clock: Clock = systemClock
  ) {}

  issue(userId: string, extraClaims: ExtraClaims = {}): TokenPair {
    const iat = toEpochSeconds(this.clock());

    const accessToken = this.sign({
      ...extraClaims,
      sub: userId,
      type: 'access',
      iat,
      exp: iat + this.config.accessTokenTtlMinutes * SECONDS_PER_MINUTE,
    });

    const refreshToken = this.sign({
      sub: userId,
      type: 'refresh',
      iat,
      exp: iat + this.config.refreshTokenTtlDays * SECONDS_PER_DAY,
    });

    return { accessToken, refreshToken, tokenType: 'bearer' };
  }

  /**
   * Check structure, signature, algorithm and expiry; return the claims.
   */
  decode(token: string): TokenClaims {
    if (jwt.decode(token, { complete: true }) === null) {
      throw new MalformedTokenError();
    }

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.config.secret, {
        algorithms: [this.config.algorithm],
        clockTimestamp: toEpochSeconds(this.clock()),
      });
    } catch (error) {
      // TokenExpiredError and NotBeforeError both extend JsonWebTokenError
      if (error instanceof jwt.TokenExpiredError) {
        throw new ExpiredTokenError();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        if (error.message === 'jwt malformed') {
          throw new MalformedTokenError();
        }
        throw new InvalidTokenError();
      }
      throw error;
    }

    const claims = claimsSchema.safeParse(payload);
    if (!claims.success) {
      throw new MalformedTokenError();
    }
    return claims.data;
  }

  /**
   * Decode and require a specific token type.
   */
  verify(token: string, expectedType: TokenType): TokenClaims {
    const claims = this.decode(token);
    if (claims.type !== expectedType) {
      throw new InvalidTokenError(`Expected ${expectedType} token`);
    }
    return claims;
  }

  private sign(claims: TokenClaims): string {
    return jwt.sign(claims, this.config.secret, { algorithm: this.config.algorithm });
  }
}
