import type { Recipe } from '../../domain/recipe/recipe.js';
import type { RecipeFilter, RecipeRepository } from '../ports.js';
import { NotFoundError } from '../errors.js';

export class RecipeQueries {
  constructor(private recipeRepo: RecipeRepository) {}

  async getRecipe(recipeId: string): Promise<Recipe> {
    const recipe = await this.recipeRepo.findById(recipeId);
    if (!recipe) {
      throw new NotFoundError('Recipe not found');
    }
    return recipe;
  }

  async listRecipes(filter: RecipeFilter): Promise<Recipe[]> {
    return this.recipeRepo.list(filter);
  }
}
