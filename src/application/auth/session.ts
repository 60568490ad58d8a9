import type { User } from '../../domain/auth/user.js';
import type { AdminWhitelist } from './adminWhitelist.js';
import type { TokenPair, TokenService } from './tokens.js';

export interface SessionResult extends TokenPair {
  userId: string;
  email: string;
  isAdmin: boolean;
}

/**
 * Issue a token pair for a user, stamping the admin flag resolved from the
 * whitelist at this moment.
 */
export function startSession(
  user: Pick<User, 'id' | 'email'>,
  tokens: TokenService,
  whitelist: AdminWhitelist
): SessionResult {
  const isAdmin = whitelist.isAdmin(user.email);
  const pair = tokens.issue(user.id, { email: user.email, is_admin: isAdmin });
  return {
    ...pair,
    userId: user.id,
    email: user.email,
    isAdmin,
  };
}
