/**
 * User domain entity.
 * The admin flag is not stored: it is resolved from the admin whitelist
 * whenever tokens are issued.
 */
export interface User {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly dietType: string | null;
  readonly allergies: string | null;
  readonly preferences: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export type UserProfile = Omit<User, 'passwordHash'>;

export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
}

export interface UserPatch {
  name?: string;
  email?: string;
  dietType?: string | null;
  allergies?: string | null;
  preferences?: string | null;
}

export function toUserProfile(user: User): UserProfile {
  const { passwordHash: _passwordHash, ...profile } = user;
  return profile;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
