import type { AdminWhitelistConfig } from '../../infra/config.js';
import { normalizeEmail } from '../../domain/auth/user.js';

/**
 * Decides whether an email grants the `is_admin` claim.
 *
 * Matches the full address against the configured emails, or the part after
 * the last `@` against the configured domains. Both sides are compared
 * trimmed and lower-cased.
 */
export class AdminWhitelist {
  private readonly emails: ReadonlySet<string>;
  private readonly domains: ReadonlySet<string>;

  constructor(config: AdminWhitelistConfig) {
    this.emails = new Set(
      config.emails.map(normalizeEmail).filter((email) => email.length > 0)
    );
    this.domains = new Set(
      config.domains
        .map((domain) => normalizeEmail(domain).replace(/^@/, ''))
        .filter((domain) => domain.length > 0)
    );
  }

  isAdmin(email: string): boolean {
    const normalized = normalizeEmail(email);
    if (normalized.length === 0) {
      return false;
    }
    if (this.emails.has(normalized)) {
      return true;
    }

    const at = normalized.lastIndexOf('@');
    if (at === -1) {
      return false;
    }
    return this.domains.has(normalized.slice(at + 1));
  }
}
