import { Router } from 'express';
import { z } from 'zod';
import { UserQueries } from '../../../application/users/queries.js';
import { UpdateProfileUseCase } from '../../../application/users/updateProfile.js';
import { anyOf, type Guards } from '../../../application/auth/guards.js';
import type { KitchenRepository, UserRepository } from '../../../application/ports.js';
import { requirePrincipal } from '../middleware/auth.js';
import { authorize } from '../middleware/authorize.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { emailSchema, pageQuerySchema, userParamsSchema } from './schemas.js';

/**
 * @openapi
 * components:
 *   schemas:
 *     UserProfile:
 *       type: object
 *       properties:
 *         id: { type: string, format: uuid }
 *         name: { type: string }
 *         email: { type: string, format: email }
 *         dietType: { type: string, nullable: true }
 *         allergies: { type: string, nullable: true }
 *         preferences: { type: string, nullable: true }
 *         createdAt: { type: string, format: date-time }
 *         updatedAt: { type: string, format: date-time }
 *     ProfileUpdate:
 *       type: object
 *       properties:
 *         name: { type: string, minLength: 2, maxLength: 100 }
 *         email: { type: string, format: email, maxLength: 255 }
 *         dietType: { type: string, nullable: true, maxLength: 50 }
 *         allergies: { type: string, nullable: true, maxLength: 1000 }
 *         preferences: { type: string, nullable: true, maxLength: 1000 }
 *
 * /api/users/me:
 *   get:
 *     tags: [Users]
 *     summary: Profile of the authenticated user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserProfile' }
 *       401:
 *         description: Missing or invalid access token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Users]
 *     summary: Update the authenticated user's profile
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/ProfileUpdate' }
 *     responses:
 *       200: { description: Updated profile }
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users:
 *   get:
 *     tags: [Users]
 *     summary: List users (admin only)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: query, name: limit, schema: { type: integer, minimum: 1, maximum: 100 } }
 *       - { in: query, name: offset, schema: { type: integer, minimum: 0 } }
 *     responses:
 *       200: { description: OK }
 *       403:
 *         description: Admin privileges required
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/{userId}:
 *   get:
 *     tags: [Users]
 *     summary: Get a profile (self or admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: userId, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: OK }
 *       403: { description: Forbidden }
 *       404: { description: User not found }
 *   patch:
 *     tags: [Users]
 *     summary: Update a profile (self only)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: userId, required: true, schema: { type: string, format: uuid } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/ProfileUpdate' }
 *     responses:
 *       200: { description: Updated profile }
 *       403: { description: Forbidden }
 *
 * /api/users/{userId}/kitchens:
 *   get:
 *     tags: [Users]
 *     summary: Kitchens of a user with their role (self or admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: userId, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: OK }
 *       403: { description: Forbidden }
 */

const optionalText = (max: number) => z.string().max(max).nullable().optional();

const profileUpdateSchema = z.object({
  name: z.string().trim().min(2).max(100).optional(),
  email: emailSchema.optional(),
  dietType: optionalText(50),
  allergies: optionalText(1000),
  preferences: optionalText(1000),
});

export interface UserRouteDependencies {
  users: UserRepository;
  kitchens: KitchenRepository;
  guards: Guards;
}

export function createUserRoutes(deps: UserRouteDependencies) {
  const router = Router();
  const queries = new UserQueries(deps.users, deps.kitchens);
  const updateProfile = new UpdateProfileUseCase(deps.users);
  const selfOrAdmin = anyOf(deps.guards.selfOnly, deps.guards.superAdmin);

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      const { userId } = requirePrincipal(req);
      res.json(await queries.getProfile(userId));
    })
  );

  router.patch(
    '/me',
    validate({ body: profileUpdateSchema }),
    asyncHandler(async (req, res) => {
      const { userId } = requirePrincipal(req);
      const body = profileUpdateSchema.parse(req.body);
      res.json(await updateProfile.execute({ userId, ...body }));
    })
  );

  router.get(
    '/',
    authorize(deps.guards.superAdmin),
    validate({ query: pageQuerySchema }),
    asyncHandler(async (req, res) => {
      const page = pageQuerySchema.parse(req.query);
      res.json(await queries.listProfiles(page));
    })
  );

  router.get(
    '/:userId',
    validate({ params: userParamsSchema }),
    authorize(selfOrAdmin),
    asyncHandler(async (req, res) => {
      const { userId } = userParamsSchema.parse(req.params);
      res.json(await queries.getProfile(userId));
    })
  );

  router.patch(
    '/:userId',
    validate({ params: userParamsSchema, body: profileUpdateSchema }),
    authorize(deps.guards.selfOnly),
    asyncHandler(async (req, res) => {
      const { userId } = userParamsSchema.parse(req.params);
      const body = profileUpdateSchema.parse(req.body);
      res.json(await updateProfile.execute({ userId, ...body }));
    })
  );

  router.get(
    '/:userId/kitchens',
    validate({ params: userParamsSchema }),
    authorize(selfOrAdmin),
    asyncHandler(async (req, res) => {
      const { userId } = userParamsSchema.parse(req.params);
      res.json(await queries.getKitchens(userId));
    })
  );

  return router;
}
