import { Password } from '../../domain/auth/password.js';
import type { UserRepository } from '../ports.js';
import { AuthenticationError } from '../errors.js';
import type { AdminWhitelist } from './adminWhitelist.js';
import type { TokenService } from './tokens.js';
import { startSession, type SessionResult } from './session.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenService,
    private whitelist: AdminWhitelist
  ) {}

  async execute(command: LoginCommand): Promise<SessionResult> {
    const user = await this.userRepo.findByEmail(command.email);
    if (!user) {
      throw new AuthenticationError('Invalid email or password');
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new AuthenticationError('Invalid email or password');
    }

    return startSession(user, this.tokens, this.whitelist);
  }
}
