import type { Pool, PoolClient } from 'pg';
import {
  assertOwnerRetained,
  isKitchenRole,
  type Kitchen,
  type KitchenMember,
  type KitchenRole,
  type KitchenWithMembers,
  type KitchenWithRole,
  type Membership,
} from '../../domain/kitchen/kitchen.js';
import type { KitchenRepository } from '../../application/ports.js';
import { ConflictError } from '../../application/errors.js';
import { isUniqueViolation, withTransaction } from './transaction.js';

interface KitchenRow {
  id: string;
  name: string;
  created_at: Date;
  updated_at: Date;
}

interface MembershipRow {
  kitchen_id: string;
  user_id: string;
  role: string;
  created_at: Date;
}

function toKitchen(row: KitchenRow): Kitchen {
  return {
    id: row.id,
    name: row.name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toRole(value: string): KitchenRole {
  if (!isKitchenRole(value)) {
    throw new Error(`Unknown kitchen role in database: ${value}`);
  }
  return value;
}

function toMembership(row: MembershipRow): Membership {
  return {
    kitchenId: row.kitchen_id,
    userId: row.user_id,
    role: toRole(row.role),
    createdAt: row.created_at,
  };
}

export class KitchenRepo implements KitchenRepository {
  constructor(private pool: Pool) {}

  async createWithOwner(name: string, ownerUserId: string): Promise<KitchenWithRole> {
    return withTransaction(this.pool, async (client) => {
      const kitchenResult = await client.query<KitchenRow>(
        `INSERT INTO kitchens (name)
         VALUES ($1)
         RETURNING id, name, created_at, updated_at`,
        [name]
      );
      const kitchen = toKitchen(kitchenResult.rows[0]);

      await client.query(
        `INSERT INTO user_kitchens (kitchen_id, user_id, role) VALUES ($1, $2, 'owner')`,
        [kitchen.id, ownerUserId]
      );

      return { ...kitchen, role: 'owner' as const };
    });
  }

  async findById(id: string): Promise<Kitchen | null> {
    const result = await this.pool.query<KitchenRow>(
      'SELECT id, name, created_at, updated_at FROM kitchens WHERE id = $1',
      [id]
    );
    return result.rows.length === 0 ? null : toKitchen(result.rows[0]);
  }

  async findWithMembers(id: string): Promise<KitchenWithMembers | null> {
    const kitchen = await this.findById(id);
    if (!kitchen) {
      return null;
    }

    const result = await this.pool.query<{
      user_id: string;
      name: string;
      email: string;
      role: string;
    }>(
      `SELECT uk.user_id, u.name, u.email, uk.role
       FROM user_kitchens uk
       JOIN users u ON u.id = uk.user_id
       WHERE uk.kitchen_id = $1
       ORDER BY uk.created_at, u.name`,
      [id]
    );

    const members: KitchenMember[] = result.rows.map((row) => ({
      userId: row.user_id,
      name: row.name,
      email: row.email,
      role: toRole(row.role),
    }));

    return { ...kitchen, members };
  }

  async listForUser(userId: string): Promise<KitchenWithRole[]> {
    const result = await this.pool.query<KitchenRow & { role: string }>(
      `SELECT k.id, k.name, k.created_at, k.updated_at, uk.role
       FROM kitchens k
       JOIN user_kitchens uk ON uk.kitchen_id = k.id
       WHERE uk.user_id = $1
       ORDER BY k.name, k.id`,
      [userId]
    );
    return result.rows.map((row) => ({ ...toKitchen(row), role: toRole(row.role) }));
  }

  async update(id: string, patch: { name?: string }): Promise<Kitchen | null> {
    if (patch.name === undefined) {
      return this.findById(id);
    }
    const result = await this.pool.query<KitchenRow>(
      `UPDATE kitchens SET name = $1, updated_at = NOW()
       WHERE id = $2
       RETURNING id, name, created_at, updated_at`,
      [patch.name, id]
    );
    return result.rows.length === 0 ? null : toKitchen(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    // Memberships go with the kitchen (ON DELETE CASCADE)
    const result = await this.pool.query('DELETE FROM kitchens WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async findMembership(kitchenId: string, userId: string): Promise<Membership | null> {
    const result = await this.pool.query<MembershipRow>(
      `SELECT kitchen_id, user_id, role, created_at
       FROM user_kitchens
       WHERE kitchen_id = $1 AND user_id = $2`,
      [kitchenId, userId]
    );
    return result.rows.length === 0 ? null : toMembership(result.rows[0]);
  }

  async addMember(kitchenId: string, userId: string, role: KitchenRole): Promise<Membership> {
    try {
      const result = await this.pool.query<MembershipRow>(
        `INSERT INTO user_kitchens (kitchen_id, user_id, role)
         VALUES ($1, $2, $3)
         RETURNING kitchen_id, user_id, role, created_at`,
        [kitchenId, userId, role]
      );
      return toMembership(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('User is already a member of this kitchen');
      }
      throw error;
    }
  }

  async changeRole(
    kitchenId: string,
    userId: string,
    role: KitchenRole
  ): Promise<Membership | null> {
    return withTransaction(this.pool, async (client) => {
      const memberships = await this.lockMemberships(client, kitchenId);
      if (!memberships.some((m) => m.userId === userId)) {
        return null;
      }

      assertOwnerRetained(memberships, { userId, role });

      const result = await client.query<MembershipRow>(
        `UPDATE user_kitchens SET role = $3
         WHERE kitchen_id = $1 AND user_id = $2
         RETURNING kitchen_id, user_id, role, created_at`,
        [kitchenId, userId, role]
      );
      return toMembership(result.rows[0]);
    });
  }

  async removeMember(kitchenId: string, userId: string): Promise<boolean> {
    return withTransaction(this.pool, async (client) => {
      const memberships = await this.lockMemberships(client, kitchenId);
      if (!memberships.some((m) => m.userId === userId)) {
        return false;
      }

      assertOwnerRetained(memberships, { userId, role: null });

      await client.query('DELETE FROM user_kitchens WHERE kitchen_id = $1 AND user_id = $2', [
        kitchenId,
        userId,
      ]);
      return true;
    });
  }

  /**
   * Lock every membership row of the kitchen so concurrent role changes
   * cannot both pass the last-owner check.
   */
  private async lockMemberships(client: PoolClient, kitchenId: string): Promise<Membership[]> {
    const result = await client.query<MembershipRow>(
      `SELECT kitchen_id, user_id, role, created_at
       FROM user_kitchens
       WHERE kitchen_id = $1
       FOR UPDATE`,
      [kitchenId]
    );
    return result.rows.map(toMembership);
  }
}
