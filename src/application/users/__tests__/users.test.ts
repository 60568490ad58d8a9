import { describe, it, expect, beforeEach } from 'vitest';
import { UpdateProfileUseCase } from '../updateProfile.js';
import { UserQueries } from '../queries.js';
import { ConflictError, NotFoundError } from '../../errors.js';
import { createInMemoryRepos, type InMemoryRepos } from '../../../test/inMemoryRepos.js';

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

describe('User use cases', () => {
  let repos: InMemoryRepos;
  let userId: string;
  let update: UpdateProfileUseCase;
  let queries: UserQueries;

  beforeEach(async () => {
    repos = createInMemoryRepos();
    userId = (await repos.users.create({ name: 'Demo', email: 'demo@example.com', passwordHash: 'hash' })).id;
    await repos.users.create({ name: 'Other', email: 'other@example.com', passwordHash: 'hash' });
    update = new UpdateProfileUseCase(repos.users);
    queries = new UserQueries(repos.users, repos.kitchens);
  });

  describe('UserQueries', () => {
    it('should never expose the password hash', async () => {
      const profile = await queries.getProfile(userId);

      expect(profile).not.toHaveProperty('passwordHash');
      expect(profile.email).toBe('demo@example.com');
    });

    it('should page through profiles', async () => {
      const page = await queries.listProfiles({ limit: 1, offset: 1 });

      expect(page.map((p) => p.email)).toEqual(['other@example.com']);
    });

    it('should raise NotFoundError for a missing user', async () => {
      await expect(queries.getProfile(MISSING_ID)).rejects.toThrow(NotFoundError);
    });

    it('should list the kitchens of a user', async () => {
      await repos.kitchens.createWithOwner('Home', userId);

      const kitchens = await queries.getKitchens(userId);
      expect(kitchens.map((k) => k.name)).toEqual(['Home']);
    });
  });

  describe('UpdateProfileUseCase', () => {
    it('should update given fields only', async () => {
      const profile = await update.execute({ userId, dietType: 'vegetarian', allergies: 'nuts' });

      expect(profile).toMatchObject({
        name: 'Demo',
        email: 'demo@example.com',
        dietType: 'vegetarian',
        allergies: 'nuts',
        preferences: null,
      });
    });

    it('should store blank optional text as null', async () => {
      await update.execute({ userId, preferences: 'spicy' });
      const profile = await update.execute({ userId, preferences: '   ' });

      expect(profile.preferences).toBeNull();
    });

    it('should normalize a new email', async () => {
      const profile = await update.execute({ userId, email: ' New@Example.com ' });

      expect(profile.email).toBe('new@example.com');
    });

    it('should allow keeping the own email in another case', async () => {
      const profile = await update.execute({ userId, email: 'DEMO@example.com' });

      expect(profile.email).toBe('demo@example.com');
    });

    it('should reject an email taken by someone else', async () => {
      await expect(update.execute({ userId, email: 'Other@Example.com' })).rejects.toThrow(
        ConflictError
      );
    });

    it('should raise NotFoundError for a missing user', async () => {
      await expect(update.execute({ userId: MISSING_ID, name: 'Ghost' })).rejects.toThrow(
        'User not found'
      );
    });
  });
});
