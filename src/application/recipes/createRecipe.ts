import type { Recipe, RecipeDifficulty } from '../../domain/recipe/recipe.js';
import type { RecipeRepository } from '../ports.js';

export interface CreateRecipeCommand {
  userId: string;
  title: string;
  description?: string | null;
  servings?: number;
  difficulty?: RecipeDifficulty;
  isAiGenerated?: boolean;
}

export class CreateRecipeUseCase {
  constructor(private recipeRepo: RecipeRepository) {}

  async execute(command: CreateRecipeCommand): Promise<Recipe> {
    return this.recipeRepo.create({
      title: command.title.trim(),
      description: command.description?.trim() || null,
      servings: command.servings,
      difficulty: command.difficulty,
      isAiGenerated: command.isAiGenerated,
      createdByUserId: command.userId,
    });
  }
}
