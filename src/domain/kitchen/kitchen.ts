import { LastOwnerError } from './errors.js';

export const KITCHEN_ROLES = ['owner', 'admin', 'member'] as const;
export type KitchenRole = (typeof KITCHEN_ROLES)[number];

/** Roles allowed to mutate a kitchen and its memberships. */
export const KITCHEN_MANAGERS: readonly KitchenRole[] = ['owner', 'admin'];

export interface Kitchen {
  readonly id: string;
  readonly name: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface Membership {
  readonly kitchenId: string;
  readonly userId: string;
  readonly role: KitchenRole;
  readonly createdAt: Date;
}

export interface KitchenMember {
  readonly userId: string;
  readonly name: string;
  readonly email: string;
  readonly role: KitchenRole;
}

export interface KitchenWithMembers extends Kitchen {
  readonly members: KitchenMember[];
}

export interface KitchenWithRole extends Kitchen {
  readonly role: KitchenRole;
}

export function isKitchenRole(value: unknown): value is KitchenRole {
  return typeof value === 'string' && (KITCHEN_ROLES as readonly string[]).includes(value);
}

/**
 * Check that applying `change` to the current memberships of one kitchen
 * leaves at least one owner. `role: null` means the member is removed.
 */
export function assertOwnerRetained(
  memberships: readonly Pick<Membership, 'userId' | 'role'>[],
  change: { userId: string; role: KitchenRole | null }
): void {
  const ownersAfter = memberships.filter((m) => {
    const role = m.userId === change.userId ? change.role : m.role;
    return role === 'owner';
  });

  if (ownersAfter.length === 0) {
    throw new LastOwnerError();
  }
}
