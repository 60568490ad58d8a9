import type { KitchenRole } from '../../domain/kitchen/kitchen.js';
import type { KitchenRepository, RecipeRepository } from '../ports.js';
import { AuthorizationError, NotFoundError } from '../errors.js';

/**
 * The verified identity behind a request.
 */
export interface Principal {
  userId: string;
  email?: string;
  isAdmin: boolean;
}

/**
 * Resource ids a route operates on, taken from its path parameters.
 */
export interface ResourceScope {
  kitchenId?: string;
  userId?: string;
  recipeId?: string;
}

export interface GuardContext {
  principal: Principal;
  scope: ResourceScope;
}

export type Decision = { allowed: true } | { allowed: false; reason: string };

/**
 * A guard decides allow/deny for one context. It may throw NotFoundError when
 * the scoped resource does not exist.
 */
export type Guard = (ctx: GuardContext) => Promise<Decision>;

const allow: Decision = { allowed: true };

function deny(reason: string): Decision {
  return { allowed: false, reason };
}

export const selfOnly: Guard = async ({ principal, scope }) => {
  if (scope.userId === undefined) {
    return deny('Missing user scope');
  }
  return principal.userId === scope.userId
    ? allow
    : deny('You are not allowed to access this resource');
};

export const superAdmin: Guard = async ({ principal }) =>
  principal.isAdmin ? allow : deny('Admin privileges required');

/**
 * Allowed when any guard allows. Guards run in order; the first allow wins.
 * The reason of the first denial is reported.
 */
export function anyOf(...guards: Guard[]): Guard {
  return async (ctx) => {
    let first: Decision | undefined;
    for (const guard of guards) {
      const decision = await guard(ctx);
      if (decision.allowed) {
        return decision;
      }
      first ??= decision;
    }
    return first ?? deny('No guard allowed this action');
  };
}

/**
 * Allowed only when every guard allows. Stops at the first denial.
 */
export function allOf(...guards: Guard[]): Guard {
  return async (ctx) => {
    for (const guard of guards) {
      const decision = await guard(ctx);
      if (!decision.allowed) {
        return decision;
      }
    }
    return allow;
  };
}

export interface GuardDependencies {
  kitchens: Pick<KitchenRepository, 'findMembership'>;
  recipes: Pick<RecipeRepository, 'findById'>;
}

export interface Guards {
  selfOnly: Guard;
  superAdmin: Guard;
  kitchenMember: Guard;
  kitchenRole(roles: readonly KitchenRole[]): Guard;
  recipeOwner: Guard;
  recipeOwnerOrAdmin: Guard;
}

/**
 * Guards that need to read membership or ownership rows.
 */
export function createGuards(deps: GuardDependencies): Guards {
  const kitchenRole =
    (roles: readonly KitchenRole[]): Guard =>
    async ({ principal, scope }) => {
      if (scope.kitchenId === undefined) {
        return deny('Missing kitchen scope');
      }
      const membership = await deps.kitchens.findMembership(scope.kitchenId, principal.userId);
      if (!membership) {
        return deny('Not a member of this kitchen');
      }
      return roles.includes(membership.role)
        ? allow
        : deny('Insufficient role for this action');
    };

  const recipeOwner: Guard = async ({ principal, scope }) => {
    if (scope.recipeId === undefined) {
      return deny('Missing recipe scope');
    }
    const recipe = await deps.recipes.findById(scope.recipeId);
    if (!recipe) {
      throw new NotFoundError('Recipe not found');
    }
    return recipe.createdByUserId === principal.userId
      ? allow
      : deny('Only the recipe owner or an admin may perform this action');
  };

  return {
    selfOnly,
    superAdmin,
    kitchenMember: kitchenRole(['owner', 'admin', 'member']),
    kitchenRole,
    recipeOwner,
    recipeOwnerOrAdmin: anyOf(recipeOwner, superAdmin),
  };
}

/**
 * Evaluate a guard and raise AuthorizationError on denial.
 */
export async function enforce(guard: Guard, ctx: GuardContext): Promise<void> {
  const decision = await guard(ctx);
  if (!decision.allowed) {
    throw new AuthorizationError(decision.reason);
  }
}
