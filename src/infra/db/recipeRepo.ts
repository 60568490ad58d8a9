import type { Pool } from 'pg';
import {
  RECIPE_DIFFICULTIES,
  type NewRecipe,
  type Recipe,
  type RecipeDifficulty,
  type RecipePatch,
} from '../../domain/recipe/recipe.js';
import type { RecipeFilter, RecipeRepository } from '../../application/ports.js';

interface RecipeRow {
  id: string;
  title: string;
  description: string | null;
  servings: number;
  difficulty: string;
  is_ai_generated: boolean;
  created_by_user_id: string | null;
  created_at: Date;
  updated_at: Date;
}

const RECIPE_COLUMNS =
  'id, title, description, servings, difficulty, is_ai_generated, created_by_user_id, created_at, updated_at';

const PATCH_COLUMNS = [
  ['title', 'title'],
  ['description', 'description'],
  ['servings', 'servings'],
  ['difficulty', 'difficulty'],
] as const satisfies readonly (readonly [keyof RecipePatch, string])[];

function toDifficulty(value: string): RecipeDifficulty {
  const difficulty = RECIPE_DIFFICULTIES.find((d) => d === value);
  if (!difficulty) {
    throw new Error(`Unknown recipe difficulty in database: ${value}`);
  }
  return difficulty;
}

function toRecipe(row: RecipeRow): Recipe {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    servings: row.servings,
    difficulty: toDifficulty(row.difficulty),
    isAiGenerated: row.is_ai_generated,
    createdByUserId: row.created_by_user_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class RecipeRepo implements RecipeRepository {
  constructor(private pool: Pool) {}

  async create(recipe: NewRecipe): Promise<Recipe> {
    const result = await this.pool.query<RecipeRow>(
      `INSERT INTO recipes (title, description, servings, difficulty, is_ai_generated, created_by_user_id)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${RECIPE_COLUMNS}`,
      [
        recipe.title,
        recipe.description ?? null,
        recipe.servings ?? 1,
        recipe.difficulty ?? 'medium',
        recipe.isAiGenerated ?? false,
        recipe.createdByUserId,
      ]
    );
    return toRecipe(result.rows[0]);
  }

  async findById(id: string): Promise<Recipe | null> {
    const result = await this.pool.query<RecipeRow>(
      `SELECT ${RECIPE_COLUMNS} FROM recipes WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toRecipe(result.rows[0]);
  }

  async list(filter: RecipeFilter): Promise<Recipe[]> {
    const values: unknown[] = [];
    let where = '';
    if (filter.createdByUserId !== undefined) {
      values.push(filter.createdByUserId);
      where = `WHERE created_by_user_id = $${values.length}`;
    }
    values.push(filter.limit, filter.offset);

    const result = await this.pool.query<RecipeRow>(
      `SELECT ${RECIPE_COLUMNS} FROM recipes
       ${where}
       ORDER BY created_at DESC, id
       LIMIT $${values.length - 1} OFFSET $${values.length}`,
      values
    );
    return result.rows.map(toRecipe);
  }

  async update(id: string, patch: RecipePatch): Promise<Recipe | null> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    for (const [key, column] of PATCH_COLUMNS) {
      const value = patch[key];
      if (value !== undefined) {
        values.push(value);
        assignments.push(`${column} = $${values.length}`);
      }
    }

    if (assignments.length === 0) {
      return this.findById(id);
    }

    values.push(id);
    const result = await this.pool.query<RecipeRow>(
      `UPDATE recipes
       SET ${assignments.join(', ')}, updated_at = NOW()
       WHERE id = $${values.length}
       RETURNING ${RECIPE_COLUMNS}`,
      values
    );
    return result.rows.length === 0 ? null : toRecipe(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM recipes WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
