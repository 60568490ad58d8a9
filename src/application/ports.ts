import type { NewUser, User, UserPatch } from '../domain/auth/user.js';
import type {
  Kitchen,
  KitchenRole,
  KitchenWithMembers,
  KitchenWithRole,
  Membership,
} from '../domain/kitchen/kitchen.js';
import type { NewRecipe, Recipe, RecipePatch } from '../domain/recipe/recipe.js';

export interface Page {
  limit: number;
  offset: number;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  /** Lookup is case-insensitive. */
  findByEmail(email: string): Promise<User | null>;
  list(page: Page): Promise<User[]>;
  /** @throws ConflictError when the email is taken */
  create(user: NewUser): Promise<User>;
  /** @throws ConflictError when the new email is taken */
  update(id: string, patch: UserPatch): Promise<User | null>;
}

export interface KitchenRepository {
  /** Create the kitchen and its first owner in one transaction. */
  createWithOwner(name: string, ownerUserId: string): Promise<KitchenWithRole>;
  findById(id: string): Promise<Kitchen | null>;
  findWithMembers(id: string): Promise<KitchenWithMembers | null>;
  listForUser(userId: string): Promise<KitchenWithRole[]>;
  update(id: string, patch: { name?: string }): Promise<Kitchen | null>;
  delete(id: string): Promise<boolean>;

  findMembership(kitchenId: string, userId: string): Promise<Membership | null>;
  /** @throws ConflictError when the user is already a member */
  addMember(kitchenId: string, userId: string, role: KitchenRole): Promise<Membership>;
  /** @throws LastOwnerError when no owner would remain */
  changeRole(kitchenId: string, userId: string, role: KitchenRole): Promise<Membership | null>;
  /** @throws LastOwnerError when no owner would remain */
  removeMember(kitchenId: string, userId: string): Promise<boolean>;
}

export interface RecipeFilter extends Page {
  createdByUserId?: string;
}

export interface RecipeRepository {
  create(recipe: NewRecipe): Promise<Recipe>;
  findById(id: string): Promise<Recipe | null>;
  list(filter: RecipeFilter): Promise<Recipe[]>;
  update(id: string, patch: RecipePatch): Promise<Recipe | null>;
  delete(id: string): Promise<boolean>;
}
