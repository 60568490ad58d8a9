import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
} from '../../../application/errors.js';
import {
  ExpiredTokenError,
  InvalidTokenError,
  MalformedTokenError,
} from '../../../application/auth/tokens.js';
import { LastOwnerError } from '../../../domain/kitchen/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

/** Token failures are not told apart in the message, only in the code. */
const TOKEN_ERROR_MESSAGE = 'Invalid or expired token';

function tokenErrorCode(err: Error): string | null {
  if (err instanceof ExpiredTokenError) return 'TOKEN_EXPIRED';
  if (err instanceof MalformedTokenError) return 'TOKEN_MALFORMED';
  if (err instanceof InvalidTokenError) return 'TOKEN_INVALID';
  return null;
}

/** Status and message of a client error raised by express.json(). */
function bodyParserError(err: Error): { status: number; message: string } | null {
  if (!('status' in err) || typeof err.status !== 'number') return null;
  if (!('expose' in err) || err.expose !== true) return null;
  if (err.status < 400 || err.status >= 500) return null;
  return { status: err.status, message: err.message };
}

const BODY_ERROR_CODES: Record<number, string> = {
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(400).json(response);
    return;
  }

  // express.json() raises a SyntaxError with status 400 on a broken body
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Malformed JSON body',
    };
    res.status(400).json(response);
    return;
  }

  const bodyError = bodyParserError(err);
  if (bodyError) {
    const response: ErrorResponse = {
      code: BODY_ERROR_CODES[bodyError.status] ?? 'BAD_REQUEST',
      message: bodyError.message,
    };
    res.status(bodyError.status).json(response);
    return;
  }

  // Token errors extend AuthenticationError, so they go first
  const tokenCode = tokenErrorCode(err);
  if (tokenCode) {
    const response: ErrorResponse = {
      code: tokenCode,
      message: TOKEN_ERROR_MESSAGE,
    };
    res.status(401).set('WWW-Authenticate', 'Bearer').json(response);
    return;
  }

  if (err instanceof AuthenticationError) {
    const response: ErrorResponse = {
      code: 'UNAUTHENTICATED',
      message: err.message,
    };
    res.status(401).set('WWW-Authenticate', 'Bearer').json(response);
    return;
  }

  if (err instanceof AuthorizationError) {
    const response: ErrorResponse = {
      code: 'FORBIDDEN',
      message: err.message,
    };
    res.status(403).json(response);
    return;
  }

  if (err instanceof NotFoundError) {
    const response: ErrorResponse = {
      code: 'NOT_FOUND',
      message: err.message,
    };
    res.status(404).json(response);
    return;
  }

  if (err instanceof LastOwnerError) {
    const response: ErrorResponse = {
      code: 'LAST_OWNER',
      message: err.message,
    };
    res.status(409).json(response);
    return;
  }

  if (err instanceof ConflictError) {
    const response: ErrorResponse = {
      code: 'CONFLICT',
      message: err.message,
    };
    res.status(409).json(response);
    return;
  }

  console.error('Unhandled error:', err);

  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
