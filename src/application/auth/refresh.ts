import type { UserRepository } from '../ports.js';
import { AuthenticationError } from '../errors.js';
import type { AdminWhitelist } from './adminWhitelist.js';
import type { TokenService } from './tokens.js';
import { startSession, type SessionResult } from './session.js';

export interface RefreshCommand {
  refreshToken: string;
}

/**
 * Exchange a refresh token for a new token pair.
 *
 * The user is reloaded so the admin claim reflects the whitelist as it is
 * now; a stale `is_admin` therefore lives at most one access-token lifetime.
 */
export class RefreshUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenService,
    private whitelist: AdminWhitelist
  ) {}

  async execute(command: RefreshCommand): Promise<SessionResult> {
    const claims = this.tokens.verify(command.refreshToken, 'refresh');

    const user = await this.userRepo.findById(claims.sub);
    if (!user) {
      throw new AuthenticationError('Account no longer exists');
    }

    return startSession(user, this.tokens, this.whitelist);
  }
}
