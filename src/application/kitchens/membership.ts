import type { KitchenRole, Membership } from '../../domain/kitchen/kitchen.js';
import type { KitchenRepository, UserRepository } from '../ports.js';
import { NotFoundError } from '../errors.js';

export interface AddMemberCommand {
  kitchenId: string;
  userId: string;
  role: KitchenRole;
}

export class AddMemberUseCase {
  constructor(
    private kitchenRepo: KitchenRepository,
    private userRepo: UserRepository
  ) {}

  async execute(command: AddMemberCommand): Promise<Membership> {
    const kitchen = await this.kitchenRepo.findById(command.kitchenId);
    if (!kitchen) {
      throw new NotFoundError('Kitchen not found');
    }

    const user = await this.userRepo.findById(command.userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    // ConflictError when already a member
    return this.kitchenRepo.addMember(command.kitchenId, command.userId, command.role);
  }
}

export interface ChangeRoleCommand {
  kitchenId: string;
  userId: string;
  role: KitchenRole;
}

export class ChangeMemberRoleUseCase {
  constructor(private kitchenRepo: KitchenRepository) {}

  async execute(command: ChangeRoleCommand): Promise<Membership> {
    // LastOwnerError when demoting the only owner
    const membership = await this.kitchenRepo.changeRole(
      command.kitchenId,
      command.userId,
      command.role
    );
    if (!membership) {
      throw new NotFoundError('User is not a member of this kitchen');
    }
    return membership;
  }
}

export class RemoveMemberUseCase {
  constructor(private kitchenRepo: KitchenRepository) {}

  async execute(kitchenId: string, userId: string): Promise<void> {
    const removed = await this.kitchenRepo.removeMember(kitchenId, userId);
    if (!removed) {
      throw new NotFoundError('User is not a member of this kitchen');
    }
  }
}
