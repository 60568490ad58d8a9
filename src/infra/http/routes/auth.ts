import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { RefreshUseCase } from '../../../application/auth/refresh.js';
import type { AdminWhitelist } from '../../../application/auth/adminWhitelist.js';
import type { TokenService } from '../../../application/auth/tokens.js';
import type { UserRepository } from '../../../application/ports.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { emailSchema } from './schemas.js';

/**
 * @openapi
 * components:
 *   schemas:
 *     TokenPair:
 *       type: object
 *       required: [accessToken, refreshToken, tokenType, userId, email, isAdmin]
 *       properties:
 *         accessToken: { type: string }
 *         refreshToken: { type: string }
 *         tokenType: { type: string, enum: [bearer] }
 *         userId: { type: string, format: uuid }
 *         email: { type: string, format: email }
 *         isAdmin: { type: boolean }
 *
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user and receive a token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, email, password]
 *             properties:
 *               name: { type: string, minLength: 2, maxLength: 100 }
 *               email: { type: string, format: email, maxLength: 255 }
 *               password: { type: string, minLength: 8, maxLength: 256 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TokenPair' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email, maxLength: 255 }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TokenPair' }
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       429:
 *         description: Too many login attempts
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange a refresh token for a new token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [refreshToken]
 *             properties:
 *               refreshToken: { type: string }
 *     responses:
 *       200:
 *         description: New token pair
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TokenPair' }
 *       401:
 *         description: Refresh token malformed, invalid, expired, or of the wrong type
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Auth]
 *     summary: Logout (stateless, the client discards its tokens)
 *     responses:
 *       204: { description: Logged out }
 */

const registerBodySchema = z.object({
  name: z.string().trim().min(2).max(100),
  email: emailSchema,
  password: z.string().min(8).max(256),
});

const loginBodySchema = z.object({
  email: emailSchema,
  password: z.string().min(1),
});

const refreshBodySchema = z.object({
  refreshToken: z.string().min(1),
});

export interface AuthRouteDependencies {
  users: UserRepository;
  tokens: TokenService;
  whitelist: AdminWhitelist;
  loginRateLimiter: RequestHandler;
}

export function createAuthRoutes(deps: AuthRouteDependencies) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(deps.users, deps.tokens, deps.whitelist);
  const loginUseCase = new LoginUseCase(deps.users, deps.tokens, deps.whitelist);
  const refreshUseCase = new RefreshUseCase(deps.users, deps.tokens, deps.whitelist);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await registerUseCase.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    deps.loginRateLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/refresh',
    validate({ body: refreshBodySchema }),
    asyncHandler(async (req, res) => {
      const body = refreshBodySchema.parse(req.body);
      const result = await refreshUseCase.execute(body);
      res.status(200).json(result);
    })
  );

  router.post('/logout', (_req, res) => {
    res.status(204).end();
  });

  return router;
}
