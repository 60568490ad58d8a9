import express from 'express';
import { AdminWhitelist } from '../../application/auth/adminWhitelist.js';
import { createGuards } from '../../application/auth/guards.js';
import { systemClock, TokenService, type Clock } from '../../application/auth/tokens.js';
import type {
  KitchenRepository,
  RecipeRepository,
  UserRepository,
} from '../../application/ports.js';
import type { AppConfig } from '../config.js';
import { authenticate } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createRateLimiters } from './middleware/rateLimit.js';
import { createAuthRoutes } from './routes/auth.js';
import { createKitchenRoutes } from './routes/kitchens.js';
import { createRecipeRoutes } from './routes/recipes.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createUserRoutes } from './routes/users.js';

export interface AppDependencies {
  config: AppConfig;
  users: UserRepository;
  kitchens: KitchenRepository;
  recipes: RecipeRepository;
  clock?: Clock;
  /** Resolves when the database answers; omitted means always healthy. */
  healthCheck?: () => Promise<unknown>;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error('timeout')), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

/**
 * Build the Express application. Nothing here listens or touches
 * process-wide state, so tests can build as many apps as they need.
 */
export function createApp(deps: AppDependencies): express.Application {
  const { config } = deps;
  const tokens = new TokenService(config.auth, deps.clock ?? systemClock);
  const whitelist = new AdminWhitelist(config.adminWhitelist);
  const guards = createGuards({ kitchens: deps.kitchens, recipes: deps.recipes });
  const limiters = createRateLimiters(config.rateLimit);
  const healthCheck = deps.healthCheck ?? (() => Promise.resolve());

  const app = express();
  app.use(express.json());
  app.use(limiters.api);

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(healthCheck(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());

  app.use(
    '/api/auth',
    createAuthRoutes({
      users: deps.users,
      tokens,
      whitelist,
      loginRateLimiter: limiters.login,
    })
  );

  const requireAuth = authenticate(tokens);
  app.use(
    '/api/users',
    requireAuth,
    createUserRoutes({ users: deps.users, kitchens: deps.kitchens, guards })
  );
  app.use(
    '/api/kitchens',
    requireAuth,
    createKitchenRoutes({ users: deps.users, kitchens: deps.kitchens, guards })
  );
  app.use('/api/recipes', requireAuth, createRecipeRoutes({ recipes: deps.recipes, guards }));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
