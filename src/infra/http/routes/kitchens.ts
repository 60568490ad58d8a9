import { Router } from 'express';
import { z } from 'zod';
import { CreateKitchenUseCase } from '../../../application/kitchens/createKitchen.js';
import {
  DeleteKitchenUseCase,
  UpdateKitchenUseCase,
} from '../../../application/kitchens/manageKitchen.js';
import {
  AddMemberUseCase,
  ChangeMemberRoleUseCase,
  RemoveMemberUseCase,
} from '../../../application/kitchens/membership.js';
import { KitchenQueries } from '../../../application/kitchens/queries.js';
import { anyOf, type Guards } from '../../../application/auth/guards.js';
import type { KitchenRepository, UserRepository } from '../../../application/ports.js';
import { KITCHEN_MANAGERS, KITCHEN_ROLES } from '../../../domain/kitchen/kitchen.js';
import { requirePrincipal } from '../middleware/auth.js';
import { authorize } from '../middleware/authorize.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { kitchenParamsSchema, memberParamsSchema } from './schemas.js';

/**
 * @openapi
 * components:
 *   schemas:
 *     KitchenRole:
 *       type: string
 *       enum: [owner, admin, member]
 *     Kitchen:
 *       type: object
 *       properties:
 *         id: { type: string, format: uuid }
 *         name: { type: string }
 *         role: { $ref: '#/components/schemas/KitchenRole' }
 *         createdAt: { type: string, format: date-time }
 *         updatedAt: { type: string, format: date-time }
 *
 * /api/kitchens:
 *   post:
 *     tags: [Kitchens]
 *     summary: Create a kitchen owned by the caller
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name]
 *             properties:
 *               name: { type: string, maxLength: 255 }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Kitchen' }
 *   get:
 *     tags: [Kitchens]
 *     summary: Kitchens the caller belongs to
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *
 * /api/kitchens/{kitchenId}:
 *   get:
 *     tags: [Kitchens]
 *     summary: Kitchen with its members (members or admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: kitchenId, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: OK }
 *       403:
 *         description: Not a member of this kitchen
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404: { description: Kitchen not found }
 *   patch:
 *     tags: [Kitchens]
 *     summary: Rename a kitchen (owner, kitchen admin or admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: kitchenId, required: true, schema: { type: string, format: uuid } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               name: { type: string, maxLength: 255 }
 *     responses:
 *       200: { description: Updated }
 *       403: { description: Insufficient role for this action }
 *   delete:
 *     tags: [Kitchens]
 *     summary: Delete a kitchen and its memberships
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: kitchenId, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       204: { description: Deleted }
 *       403: { description: Insufficient role for this action }
 *
 * /api/kitchens/{kitchenId}/members:
 *   post:
 *     tags: [Kitchens]
 *     summary: Add a member
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: kitchenId, required: true, schema: { type: string, format: uuid } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [userId]
 *             properties:
 *               userId: { type: string, format: uuid }
 *               role: { $ref: '#/components/schemas/KitchenRole' }
 *     responses:
 *       201: { description: Member added }
 *       404: { description: Kitchen or user not found }
 *       409:
 *         description: Already a member
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/kitchens/{kitchenId}/members/{userId}:
 *   get:
 *     tags: [Kitchens]
 *     summary: Membership of one user
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: kitchenId, required: true, schema: { type: string, format: uuid } }
 *       - { in: path, name: userId, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: OK }
 *       404: { description: Not a member }
 *   patch:
 *     tags: [Kitchens]
 *     summary: Change a member's role
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: kitchenId, required: true, schema: { type: string, format: uuid } }
 *       - { in: path, name: userId, required: true, schema: { type: string, format: uuid } }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [role]
 *             properties:
 *               role: { $ref: '#/components/schemas/KitchenRole' }
 *     responses:
 *       200: { description: Updated }
 *       409:
 *         description: The kitchen would be left without an owner
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Kitchens]
 *     summary: Remove a member (managers, admin, or the member leaving)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: kitchenId, required: true, schema: { type: string, format: uuid } }
 *       - { in: path, name: userId, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       204: { description: Removed }
 *       409: { description: The kitchen would be left without an owner }
 */

const kitchenBodySchema = z.object({
  name: z.string().trim().min(1).max(255),
});

const kitchenUpdateSchema = kitchenBodySchema.partial();

const addMemberSchema = z.object({
  userId: z.string().uuid(),
  role: z.enum(KITCHEN_ROLES).default('member'),
});

const changeRoleSchema = z.object({
  role: z.enum(KITCHEN_ROLES),
});

export interface KitchenRouteDependencies {
  users: UserRepository;
  kitchens: KitchenRepository;
  guards: Guards;
}

export function createKitchenRoutes(deps: KitchenRouteDependencies) {
  const router = Router();
  const { guards } = deps;
  const queries = new KitchenQueries(deps.kitchens);
  const createKitchen = new CreateKitchenUseCase(deps.kitchens);
  const updateKitchen = new UpdateKitchenUseCase(deps.kitchens);
  const deleteKitchen = new DeleteKitchenUseCase(deps.kitchens);
  const addMember = new AddMemberUseCase(deps.kitchens, deps.users);
  const changeRole = new ChangeMemberRoleUseCase(deps.kitchens);
  const removeMember = new RemoveMemberUseCase(deps.kitchens);

  const memberOrAdmin = anyOf(guards.kitchenMember, guards.superAdmin);
  const managerOrAdmin = anyOf(guards.kitchenRole(KITCHEN_MANAGERS), guards.superAdmin);
  const leavingOrManager = anyOf(
    guards.selfOnly,
    guards.kitchenRole(KITCHEN_MANAGERS),
    guards.superAdmin
  );

  router.post(
    '/',
    validate({ body: kitchenBodySchema }),
    asyncHandler(async (req, res) => {
      const { userId } = requirePrincipal(req);
      const body = kitchenBodySchema.parse(req.body);
      res.status(201).json(await createKitchen.execute({ userId, name: body.name }));
    })
  );

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const { userId } = requirePrincipal(req);
      res.json(await queries.listForUser(userId));
    })
  );

  router.get(
    '/:kitchenId',
    validate({ params: kitchenParamsSchema }),
    authorize(memberOrAdmin),
    asyncHandler(async (req, res) => {
      const { kitchenId } = kitchenParamsSchema.parse(req.params);
      res.json(await queries.getKitchen(kitchenId));
    })
  );

  router.patch(
    '/:kitchenId',
    validate({ params: kitchenParamsSchema, body: kitchenUpdateSchema }),
    authorize(managerOrAdmin),
    asyncHandler(async (req, res) => {
      const { kitchenId } = kitchenParamsSchema.parse(req.params);
      const body = kitchenUpdateSchema.parse(req.body);
      res.json(await updateKitchen.execute({ kitchenId, name: body.name }));
    })
  );

  router.delete(
    '/:kitchenId',
    validate({ params: kitchenParamsSchema }),
    authorize(managerOrAdmin),
    asyncHandler(async (req, res) => {
      const { kitchenId } = kitchenParamsSchema.parse(req.params);
      await deleteKitchen.execute(kitchenId);
      res.status(204).end();
    })
  );

  router.post(
    '/:kitchenId/members',
    validate({ params: kitchenParamsSchema, body: addMemberSchema }),
    authorize(managerOrAdmin),
    asyncHandler(async (req, res) => {
      const { kitchenId } = kitchenParamsSchema.parse(req.params);
      const body = addMemberSchema.parse(req.body);
      res.status(201).json(await addMember.execute({ kitchenId, ...body }));
    })
  );

  router.get(
    '/:kitchenId/members/:userId',
    validate({ params: memberParamsSchema }),
    authorize(memberOrAdmin),
    asyncHandler(async (req, res) => {
      const { kitchenId, userId } = memberParamsSchema.parse(req.params);
      res.json(await queries.getMembership(kitchenId, userId));
    })
  );

  router.patch(
    '/:kitchenId/members/:userId',
    validate({ params: memberParamsSchema, body: changeRoleSchema }),
    authorize(managerOrAdmin),
    asyncHandler(async (req, res) => {
      const { kitchenId, userId } = memberParamsSchema.parse(req.params);
      const { role } = changeRoleSchema.parse(req.body);
      res.json(await changeRole.execute({ kitchenId, userId, role }));
    })
  );

  router.delete(
    '/:kitchenId/members/:userId',
    validate({ params: memberParamsSchema }),
    authorize(leavingOrManager),
    asyncHandler(async (req, res) => {
      const { kitchenId, userId } = memberParamsSchema.parse(req.params);
      await removeMember.execute(kitchenId, userId);
      res.status(204).end();
    })
  );

  return router;
}
