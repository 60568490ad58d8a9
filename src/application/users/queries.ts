import { toUserProfile, type UserProfile } from '../../domain/auth/user.js';
import type { KitchenWithRole } from '../../domain/kitchen/kitchen.js';
import type { KitchenRepository, Page, UserRepository } from '../ports.js';
import { NotFoundError } from '../errors.js';

export class UserQueries {
  constructor(
    private userRepo: UserRepository,
    private kitchenRepo: KitchenRepository
  ) {}

  async getProfile(userId: string): Promise<UserProfile> {
    const user = await this.userRepo.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toUserProfile(user);
  }

  async listProfiles(page: Page): Promise<UserProfile[]> {
    const users = await this.userRepo.list(page);
    return users.map(toUserProfile);
  }

  async getKitchens(userId: string): Promise<KitchenWithRole[]> {
    return this.kitchenRepo.listForUser(userId);
  }
}
