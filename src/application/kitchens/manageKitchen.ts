import type { Kitchen } from '../../domain/kitchen/kitchen.js';
import type { KitchenRepository } from '../ports.js';
import { NotFoundError } from '../errors.js';

export interface UpdateKitchenCommand {
  kitchenId: string;
  name?: string;
}

export class UpdateKitchenUseCase {
  constructor(private kitchenRepo: KitchenRepository) {}

  async execute(command: UpdateKitchenCommand): Promise<Kitchen> {
    const kitchen = await this.kitchenRepo.update(command.kitchenId, {
      name: command.name?.trim(),
    });
    if (!kitchen) {
      throw new NotFoundError('Kitchen not found');
    }
    return kitchen;
  }
}

export class DeleteKitchenUseCase {
  constructor(private kitchenRepo: KitchenRepository) {}

  async execute(kitchenId: string): Promise<void> {
    const deleted = await this.kitchenRepo.delete(kitchenId);
    if (!deleted) {
      throw new NotFoundError('Kitchen not found');
    }
  }
}
