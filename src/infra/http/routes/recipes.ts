import { Router } from 'express';
import { z } from 'zod';
import { CreateRecipeUseCase } from '../../../application/recipes/createRecipe.js';
import {
  DeleteRecipeUseCase,
  UpdateRecipeUseCase,
} from '../../../application/recipes/manageRecipe.js';
import { RecipeQueries } from '../../../application/recipes/queries.js';
import type { Guards } from '../../../application/auth/guards.js';
import type { RecipeRepository } from '../../../application/ports.js';
import { RECIPE_DIFFICULTIES } from '../../../domain/recipe/recipe.js';
import { requirePrincipal } from '../middleware/auth.js';
import { authorize } from '../middleware/authorize.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { pageQuerySchema, recipeParamsSchema } from './schemas.js';

/**
 * @openapi
 * components:
 *   schemas:
 *     Recipe:
 *       type: object
 *       properties:
 *         id: { type: string, format: uuid }
 *         title: { type: string }
 *         description: { type: string, nullable: true }
 *         servings: { type: integer, minimum: 1 }
 *         difficulty: { type: string, enum: [easy, medium, hard] }
 *         isAiGenerated: { type: boolean }
 *         createdByUserId: { type: string, format: uuid, nullable: true }
 *         createdAt: { type: string, format: date-time }
 *         updatedAt: { type: string, format: date-time }
 *
 * /api/recipes:
 *   post:
 *     tags: [Recipes]
 *     summary: Create a recipe owned by the caller
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title]
 *             properties:
 *               title: { type: string, maxLength: 255 }
 *               description: { type: string, nullable: true }
 *               servings: { type: integer, minimum: 1 }
 *               difficulty: { type: string, enum: [easy, medium, hard] }
 *               isAiGenerated: { type: boolean }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Recipe' }
 *   get:
 *     tags: [Recipes]
 *     summary: List recipes, newest first
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: query, name: mine, schema: { type: boolean } }
 *       - { in: query, name: limit, schema: { type: integer, minimum: 1, maximum: 100 } }
 *       - { in: query, name: offset, schema: { type: integer, minimum: 0 } }
 *     responses:
 *       200: { description: OK }
 *
 * /api/recipes/{recipeId}:
 *   get:
 *     tags: [Recipes]
 *     summary: Get a recipe
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: recipeId, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: OK }
 *       404: { description: Recipe not found }
 *   patch:
 *     tags: [Recipes]
 *     summary: Update a recipe (owner or admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: recipeId, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       200: { description: Updated }
 *       403:
 *         description: Not the recipe owner
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404: { description: Recipe not found }
 *   delete:
 *     tags: [Recipes]
 *     summary: Delete a recipe (owner or admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: recipeId, required: true, schema: { type: string, format: uuid } }
 *     responses:
 *       204: { description: Deleted }
 *       403: { description: Not the recipe owner }
 *       404: { description: Recipe not found }
 */

const recipeBodySchema = z.object({
  title: z.string().trim().min(1).max(255),
  description: z.string().max(5000).nullable().optional(),
  servings: z.number().int().min(1).max(100).optional(),
  difficulty: z.enum(RECIPE_DIFFICULTIES).optional(),
  isAiGenerated: z.boolean().optional(),
});

const recipeUpdateSchema = recipeBodySchema.omit({ isAiGenerated: true }).partial();

const recipeListQuerySchema = pageQuerySchema.extend({
  mine: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export interface RecipeRouteDependencies {
  recipes: RecipeRepository;
  guards: Guards;
}

export function createRecipeRoutes(deps: RecipeRouteDependencies) {
  const router = Router();
  const queries = new RecipeQueries(deps.recipes);
  const createRecipe = new CreateRecipeUseCase(deps.recipes);
  const updateRecipe = new UpdateRecipeUseCase(deps.recipes);
  const deleteRecipe = new DeleteRecipeUseCase(deps.recipes);

  router.post(
    '/',
    validate({ body: recipeBodySchema }),
    asyncHandler(async (req, res) => {
      const { userId } = requirePrincipal(req);
      const body = recipeBodySchema.parse(req.body);
      res.status(201).json(await createRecipe.execute({ userId, ...body }));
    })
  );

  router.get(
    '/',
    validate({ query: recipeListQuerySchema }),
    asyncHandler(async (req, res) => {
      const { userId } = requirePrincipal(req);
      const { mine, limit, offset } = recipeListQuerySchema.parse(req.query);
      res.json(
        await queries.listRecipes({
          limit,
          offset,
          createdByUserId: mine ? userId : undefined,
        })
      );
    })
  );

  router.get(
    '/:recipeId',
    validate({ params: recipeParamsSchema }),
    asyncHandler(async (req, res) => {
      const { recipeId } = recipeParamsSchema.parse(req.params);
      res.json(await queries.getRecipe(recipeId));
    })
  );

  router.patch(
    '/:recipeId',
    validate({ params: recipeParamsSchema, body: recipeUpdateSchema }),
    authorize(deps.guards.recipeOwnerOrAdmin),
    asyncHandler(async (req, res) => {
      const { recipeId } = recipeParamsSchema.parse(req.params);
      const body = recipeUpdateSchema.parse(req.body);
      res.json(await updateRecipe.execute({ recipeId, ...body }));
    })
  );

  router.delete(
    '/:recipeId',
    validate({ params: recipeParamsSchema }),
    authorize(deps.guards.recipeOwnerOrAdmin),
    asyncHandler(async (req, res) => {
      const { recipeId } = recipeParamsSchema.parse(req.params);
      await deleteRecipe.execute(recipeId);
      res.status(204).end();
    })
  );

  return router;
}
