import { normalizeEmail, toUserProfile, type UserPatch, type UserProfile } from '../../domain/auth/user.js';
import type { UserRepository } from '../ports.js';
import { ConflictError, NotFoundError } from '../errors.js';

export interface UpdateProfileCommand {
  userId: string;
  name?: string;
  email?: string;
  dietType?: string | null;
  allergies?: string | null;
  preferences?: string | null;
}

/**
 * Blank optional text is stored as null.
 */
function optionalText(value: string | null | undefined): string | null | undefined {
  if (value === undefined || value === null) {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? null : trimmed;
}

export class UpdateProfileUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: UpdateProfileCommand): Promise<UserProfile> {
    const patch: UserPatch = {};

    if (command.name !== undefined) {
      patch.name = command.name.trim();
    }
    if (command.email !== undefined) {
      const email = normalizeEmail(command.email);
      const owner = await this.userRepo.findByEmail(email);
      if (owner && owner.id !== command.userId) {
        throw new ConflictError('Email already registered');
      }
      patch.email = email;
    }

    const dietType = optionalText(command.dietType);
    if (dietType !== undefined) patch.dietType = dietType;
    const allergies = optionalText(command.allergies);
    if (allergies !== undefined) patch.allergies = allergies;
    const preferences = optionalText(command.preferences);
    if (preferences !== undefined) patch.preferences = preferences;

    const updated = await this.userRepo.update(command.userId, patch);
    if (!updated) {
      throw new NotFoundError('User not found');
    }
    return toUserProfile(updated);
  }
}
