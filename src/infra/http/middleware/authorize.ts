import type { Request, RequestHandler } from 'express';
import { enforce, type Guard, type ResourceScope } from '../../../application/auth/guards.js';
import { asyncHandler } from './asyncHandler.js';
import { requirePrincipal } from './auth.js';

function scopeFrom(req: Request): ResourceScope {
  const { kitchenId, userId, recipeId } = req.params;
  return { kitchenId, userId, recipeId };
}

/**
 * Run a guard against the principal and the route's path parameters.
 * Denials reach the error handler as AuthorizationError (403).
 */
export function authorize(guard: Guard): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    await enforce(guard, { principal: requirePrincipal(req), scope: scopeFrom(req) });
    next();
  });
}
