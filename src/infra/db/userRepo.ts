import type { Pool } from 'pg';
import type { NewUser, User, UserPatch } from '../../domain/auth/user.js';
import type { Page, UserRepository } from '../../application/ports.js';
import { ConflictError } from '../../application/errors.js';
import { isUniqueViolation } from './transaction.js';

interface UserRow {
  id: string;
  name: string;
  email: string;
  password_hash: string;
  diet_type: string | null;
  allergies: string | null;
  preferences: string | null;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS =
  'id, name, email, password_hash, diet_type, allergies, preferences, created_at, updated_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordHash: row.password_hash,
    dietType: row.diet_type,
    allergies: row.allergies,
    preferences: row.preferences,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const PATCH_COLUMNS = [
  ['name', 'name'],
  ['email', 'email'],
  ['dietType', 'diet_type'],
  ['allergies', 'allergies'],
  ['preferences', 'preferences'],
] as const satisfies readonly (readonly [keyof UserPatch, string])[];

export class UserRepo implements UserRepository {
  constructor(private pool: Pool) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE LOWER(email) = LOWER($1)`,
      [email.trim()]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async list(page: Page): Promise<User[]> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY created_at, id LIMIT $1 OFFSET $2`,
      [page.limit, page.offset]
    );
    return result.rows.map(toUser);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (name, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING ${USER_COLUMNS}`,
        [user.name, user.email, user.passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Email already registered');
      }
      throw error;
    }
  }

  async update(id: string, patch: UserPatch): Promise<User | null> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    for (const [key, column] of PATCH_COLUMNS) {
      const value = patch[key];
      if (value !== undefined) {
        values.push(value);
        assignments.push(`${column} = $${values.length}`);
      }
    }

    if (assignments.length === 0) {
      return this.findById(id);
    }

    values.push(id);
    try {
      const result = await this.pool.query<UserRow>(
        `UPDATE users
         SET ${assignments.join(', ')}, updated_at = NOW()
         WHERE id = $${values.length}
         RETURNING ${USER_COLUMNS}`,
        values
      );
      return result.rows.length === 0 ? null : toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Email already registered');
      }
      throw error;
    }
  }
}
