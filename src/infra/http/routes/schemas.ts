import { z } from 'zod';

export const pageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export const userParamsSchema = z.object({
  userId: z.string().uuid(),
});

export const kitchenParamsSchema = z.object({
  kitchenId: z.string().uuid(),
});

export const memberParamsSchema = z.object({
  kitchenId: z.string().uuid(),
  userId: z.string().uuid(),
});

export const recipeParamsSchema = z.object({
  recipeId: z.string().uuid(),
});

/** users.email is VARCHAR(255). */
export const emailSchema = z.string().trim().email().max(255);
