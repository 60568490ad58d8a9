import type { KitchenWithRole } from '../../domain/kitchen/kitchen.js';
import type { KitchenRepository } from '../ports.js';

export interface CreateKitchenCommand {
  userId: string;
  name: string;
}

/**
 * Create a kitchen with the caller as its owner.
 */
export class CreateKitchenUseCase {
  constructor(private kitchenRepo: KitchenRepository) {}

  async execute(command: CreateKitchenCommand): Promise<KitchenWithRole> {
    return this.kitchenRepo.createWithOwner(command.name.trim(), command.userId);
  }
}
