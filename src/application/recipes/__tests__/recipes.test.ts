import { describe, it, expect, beforeEach } from 'vitest';
import { CreateRecipeUseCase } from '../createRecipe.js';
import { DeleteRecipeUseCase, UpdateRecipeUseCase } from '../manageRecipe.js';
import { RecipeQueries } from '../queries.js';
import { NotFoundError } from '../../errors.js';
import { InMemoryRecipeRepo } from '../../../test/inMemoryRepos.js';

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

describe('Recipe use cases', () => {
  let recipes: InMemoryRecipeRepo;
  let create: CreateRecipeUseCase;
  let queries: RecipeQueries;

  beforeEach(() => {
    recipes = new InMemoryRecipeRepo();
    create = new CreateRecipeUseCase(recipes);
    queries = new RecipeQueries(recipes);
  });

  it('should create a recipe owned by the caller with defaults', async () => {
    const recipe = await create.execute({ userId: 'user-1', title: ' Pancakes ', description: '  ' });

    expect(recipe).toMatchObject({
      title: 'Pancakes',
      description: null,
      servings: 1,
      difficulty: 'medium',
      isAiGenerated: false,
      createdByUserId: 'user-1',
    });
  });

  it('should filter by creator and list newest first', async () => {
    const first = await create.execute({ userId: 'user-1', title: 'Soup' });
    await create.execute({ userId: 'user-2', title: 'Salad' });
    const third = await create.execute({ userId: 'user-1', title: 'Stew' });

    const mine = await queries.listRecipes({ limit: 10, offset: 0, createdByUserId: 'user-1' });

    expect(mine.map((r) => r.id)).toEqual([third.id, first.id]);
  });

  it('should update and delete a recipe', async () => {
    const recipe = await create.execute({ userId: 'user-1', title: 'Soup' });

    const updated = await new UpdateRecipeUseCase(recipes).execute({
      recipeId: recipe.id,
      servings: 4,
      difficulty: 'medium',
    });
    expect(updated).toMatchObject({ title: 'Soup', servings: 4, difficulty: 'medium' });

    await new DeleteRecipeUseCase(recipes).execute(recipe.id);
    await expect(queries.getRecipe(recipe.id)).rejects.toThrow('Recipe not found');
  });

  it('should store a blank description as null on update', async () => {
    const recipe = await create.execute({ userId: 'user-1', title: 'Soup', description: 'Hot' });
    const update = new UpdateRecipeUseCase(recipes);

    const blanked = await update.execute({ recipeId: recipe.id, description: '   ' });
    expect(blanked.description).toBeNull();

    const trimmed = await update.execute({ recipeId: recipe.id, description: ' Cold ' });
    expect(trimmed.description).toBe('Cold');

    const untouched = await update.execute({ recipeId: recipe.id, servings: 2 });
    expect(untouched.description).toBe('Cold');
  });

  it('should raise NotFoundError for a missing recipe', async () => {
    await expect(
      new UpdateRecipeUseCase(recipes).execute({ recipeId: MISSING_ID, title: 'x' })
    ).rejects.toThrow(NotFoundError);
    await expect(new DeleteRecipeUseCase(recipes).execute(MISSING_ID)).rejects.toThrow(
      NotFoundError
    );
  });
});
