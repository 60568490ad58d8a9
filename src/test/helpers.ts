import type { Clock } from '../application/auth/tokens.js';
import { loadConfig, type AppConfig } from '../infra/config.js';

export const TEST_SECRET = 'test-secret-for-unit-tests';

/**
 * Configuration for tests, built through the same loader as production.
 * Rate limits are raised so suites do not trip them by accident.
 */
export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    JWT_SECRET: TEST_SECRET,
    RATE_LIMIT_PER_MINUTE: '1000',
    LOGIN_RATE_LIMIT_PER_MINUTE: '1000',
    ...env,
  });
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock {
  private current: Date;

  constructor(start: Date | string = '2024-01-01T00:00:00Z') {
    this.current = new Date(start);
  }

  readonly now: Clock = () => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  advanceSeconds(seconds: number): void {
    this.advance(seconds * 1000);
  }
}
