import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';
import type { RateLimitConfig } from '../../config.js';
import type { ErrorResponse } from './errorHandler.js';

export interface RateLimiters {
  api: RequestHandler;
  login: RequestHandler;
}

function limiter(perMinute: number, message: string): RequestHandler {
  const body: ErrorResponse = { code: 'RATE_LIMITED', message };
  return rateLimit({
    windowMs: 60 * 1000,
    limit: perMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      res.status(429).json(body);
    },
  });
}

/**
 * Per-app limiters with an in-memory store (reset on restart).
 * The API limiter applies to every route; the login limiter is keyed by IP.
 */
export function createRateLimiters(config: RateLimitConfig): RateLimiters {
  return {
    api: limiter(config.perMinute, 'Too many requests, please try again later.'),
    login: limiter(config.loginPerMinute, 'Too many login attempts, please try again later.'),
  };
}
