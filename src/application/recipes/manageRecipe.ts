import type { Recipe, RecipePatch } from '../../domain/recipe/recipe.js';
import type { RecipeRepository } from '../ports.js';
import { NotFoundError } from '../errors.js';

export interface UpdateRecipeCommand extends RecipePatch {
  recipeId: string;
}

export class UpdateRecipeUseCase {
  constructor(private recipeRepo: RecipeRepository) {}

  async execute(command: UpdateRecipeCommand): Promise<Recipe> {
    const { recipeId, ...patch } = command;
    const recipe = await this.recipeRepo.update(recipeId, {
      ...patch,
      title: patch.title?.trim(),
      // Blank descriptions are stored as null, as on create
      description:
        patch.description === undefined ? undefined : patch.description?.trim() || null,
    });
    if (!recipe) {
      throw new NotFoundError('Recipe not found');
    }
    return recipe;
  }
}

export class DeleteRecipeUseCase {
  constructor(private recipeRepo: RecipeRepository) {}

  async execute(recipeId: string): Promise<void> {
    const deleted = await this.recipeRepo.delete(recipeId);
    if (!deleted) {
      throw new NotFoundError('Recipe not found');
    }
  }
}
