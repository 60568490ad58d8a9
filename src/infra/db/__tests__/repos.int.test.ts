import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import type { Pool } from 'pg';
import { randomUUID } from 'crypto';
import { createPool } from '../pool.js';
import { migrate } from '../migrate.js';
import { UserRepo } from '../userRepo.js';
import { KitchenRepo } from '../kitchenRepo.js';
import { RecipeRepo } from '../recipeRepo.js';
import { ConflictError } from '../../../application/errors.js';
import { LastOwnerError } from '../../../domain/kitchen/errors.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('PostgreSQL repositories', () => {
  let pool: Pool;
  let users: UserRepo;
  let kitchens: KitchenRepo;
  let recipes: RecipeRepo;

  const uniqueEmail = (label: string) =>
    `vitest-${label}-${Date.now()}-${Math.random().toString(16).slice(2)}@example.com`;

  const createUser = (label: string) =>
    users.create({ name: label, email: uniqueEmail(label), passwordHash: 'hash' });

  beforeAll(async () => {
    pool = createPool(process.env.DATABASE_URL);
    await migrate(pool);
    users = new UserRepo(pool);
    kitchens = new KitchenRepo(pool);
    recipes = new RecipeRepo(pool);
  });

  afterEach(async () => {
    // Kitchens of test users first; memberships and recipes cascade or detach
    await pool.query(
      `DELETE FROM kitchens WHERE id IN (
         SELECT uk.kitchen_id FROM user_kitchens uk
         JOIN users u ON u.id = uk.user_id
         WHERE u.email LIKE 'vitest-%@example.com')`
    );
    await pool.query(
      `DELETE FROM recipes WHERE created_by_user_id IN (
         SELECT id FROM users WHERE email LIKE 'vitest-%@example.com')`
    );
    await pool.query("DELETE FROM users WHERE email LIKE 'vitest-%@example.com'");
  });

  afterAll(async () => {
    await pool.end();
  });

  describe('UserRepo', () => {
    it('should find users by email regardless of case', async () => {
      const user = await createUser('case');

      const found = await users.findByEmail(user.email.toUpperCase());
      expect(found?.id).toBe(user.id);
    });

    it('should map a duplicate email to ConflictError', async () => {
      const user = await createUser('dup');

      await expect(
        users.create({ name: 'again', email: user.email.toUpperCase(), passwordHash: 'hash' })
      ).rejects.toThrow(ConflictError);
    });

    it('should apply a partial update', async () => {
      const user = await createUser('patch');

      const updated = await users.update(user.id, { dietType: 'vegan', allergies: null });
      expect(updated).toMatchObject({ name: 'patch', dietType: 'vegan', allergies: null });
      expect(await users.update(randomUUID(), { name: 'nobody' })).toBeNull();
    });
  });

  describe('KitchenRepo', () => {
    it('should create a kitchen with its owner atomically', async () => {
      const owner = await createUser('owner');

      const kitchen = await kitchens.createWithOwner('Test Kitchen', owner.id);

      expect(kitchen.role).toBe('owner');
      expect((await kitchens.findMembership(kitchen.id, owner.id))?.role).toBe('owner');
    });

    it('should roll back the kitchen when the owner does not exist', async () => {
      const before = await pool.query<{ count: string }>('SELECT COUNT(*) AS count FROM kitchens');

      await expect(kitchens.createWithOwner('Orphan', randomUUID())).rejects.toThrow();

      const after = await pool.query<{ count: string }>('SELECT COUNT(*) AS count FROM kitchens');
      expect(after.rows[0].count).toBe(before.rows[0].count);
    });

    it('should enforce the last-owner rule', async () => {
      const owner = await createUser('last-owner');
      const cook = await createUser('cook');
      const kitchen = await kitchens.createWithOwner('Test Kitchen', owner.id);
      await kitchens.addMember(kitchen.id, cook.id, 'member');

      await expect(kitchens.changeRole(kitchen.id, owner.id, 'member')).rejects.toThrow(
        LastOwnerError
      );
      await expect(kitchens.removeMember(kitchen.id, owner.id)).rejects.toThrow(LastOwnerError);

      await kitchens.changeRole(kitchen.id, cook.id, 'owner');
      expect(await kitchens.removeMember(kitchen.id, owner.id)).toBe(true);
    });

    it('should never leave a kitchen ownerless under concurrent demotions', async () => {
      const first = await createUser('co-owner-a');
      const second = await createUser('co-owner-b');
      const kitchen = await kitchens.createWithOwner('Test Kitchen', first.id);
      await kitchens.addMember(kitchen.id, second.id, 'owner');

      const results = await Promise.allSettled([
        kitchens.changeRole(kitchen.id, first.id, 'member'),
        kitchens.changeRole(kitchen.id, second.id, 'member'),
      ]);

      expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
      const members = await kitchens.findWithMembers(kitchen.id);
      expect(members?.members.filter((m) => m.role === 'owner')).toHaveLength(1);
    });

    it('should map a duplicate membership to ConflictError', async () => {
      const owner = await createUser('dup-member');
      const kitchen = await kitchens.createWithOwner('Test Kitchen', owner.id);

      await expect(kitchens.addMember(kitchen.id, owner.id, 'member')).rejects.toThrow(
        ConflictError
      );
    });
  });

  describe('RecipeRepo', () => {
    it('should create, filter, update and delete recipes', async () => {
      const author = await createUser('author');

      const recipe = await recipes.create({ title: 'Soup', createdByUserId: author.id });
      expect(recipe).toMatchObject({ servings: 1, difficulty: 'medium', isAiGenerated: false });

      const mine = await recipes.list({ limit: 10, offset: 0, createdByUserId: author.id });
      expect(mine.map((r) => r.id)).toEqual([recipe.id]);

      const updated = await recipes.update(recipe.id, { servings: 3 });
      expect(updated?.servings).toBe(3);

      expect(await recipes.delete(recipe.id)).toBe(true);
      expect(await recipes.findById(recipe.id)).toBeNull();
    });
  });
});
