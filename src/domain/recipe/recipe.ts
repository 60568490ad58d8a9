export const RECIPE_DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export type RecipeDifficulty = (typeof RECIPE_DIFFICULTIES)[number];

export interface Recipe {
  readonly id: string;
  readonly title: string;
  readonly description: string | null;
  readonly servings: number;
  readonly difficulty: RecipeDifficulty;
  readonly isAiGenerated: boolean;
  readonly createdByUserId: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewRecipe {
  title: string;
  description?: string | null;
  servings?: number;
  difficulty?: RecipeDifficulty;
  isAiGenerated?: boolean;
  createdByUserId: string | null;
}

export interface RecipePatch {
  title?: string;
  description?: string | null;
  servings?: number;
  difficulty?: RecipeDifficulty;
}
