import { Password } from '../../domain/auth/password.js';
import { normalizeEmail } from '../../domain/auth/user.js';
import type { UserRepository } from '../ports.js';
import { ConflictError } from '../errors.js';
import type { AdminWhitelist } from './adminWhitelist.js';
import type { TokenService } from './tokens.js';
import { startSession, type SessionResult } from './session.js';

export interface RegisterCommand {
  name: string;
  email: string;
  password: string;
}

/**
 * Create an account and log it in.
 */
export class RegisterUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenService,
    private whitelist: AdminWhitelist
  ) {}

  async execute(command: RegisterCommand): Promise<SessionResult> {
    const email = normalizeEmail(command.email);

    const existing = await this.userRepo.findByEmail(email);
    if (existing) {
      throw new ConflictError('Email already registered');
    }

    const passwordHash = await Password.hash(command.password);

    // The repository still raises ConflictError if a concurrent registration wins
    const user = await this.userRepo.create({
      name: command.name.trim(),
      email,
      passwordHash,
    });

    return startSession(user, this.tokens, this.whitelist);
  }
}
