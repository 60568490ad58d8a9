import type {
  KitchenWithMembers,
  KitchenWithRole,
  Membership,
} from '../../domain/kitchen/kitchen.js';
import type { KitchenRepository } from '../ports.js';
import { NotFoundError } from '../errors.js';

export class KitchenQueries {
  constructor(private kitchenRepo: KitchenRepository) {}

  async listForUser(userId: string): Promise<KitchenWithRole[]> {
    return this.kitchenRepo.listForUser(userId);
  }

  async getKitchen(kitchenId: string): Promise<KitchenWithMembers> {
    const kitchen = await this.kitchenRepo.findWithMembers(kitchenId);
    if (!kitchen) {
      throw new NotFoundError('Kitchen not found');
    }
    return kitchen;
  }

  async getMembership(kitchenId: string, userId: string): Promise<Membership> {
    const membership = await this.kitchenRepo.findMembership(kitchenId, userId);
    if (!membership) {
      throw new NotFoundError('User is not a member of this kitchen');
    }
    return membership;
  }
}
