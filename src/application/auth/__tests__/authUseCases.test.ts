import { describe, it, expect, beforeEach } from 'vitest';
import { RegisterUseCase } from '../register.js';
import { LoginUseCase } from '../login.js';
import { RefreshUseCase } from '../refresh.js';
import { AdminWhitelist } from '../adminWhitelist.js';
import { InvalidTokenError, TokenService } from '../tokens.js';
import { AuthenticationError, ConflictError } from '../../errors.js';
import { InMemoryUserRepo } from '../../../test/inMemoryRepos.js';
import { ManualClock, testConfig } from '../../../test/helpers.js';

describe('Auth use cases', () => {
  let users: InMemoryUserRepo;
  let clock: ManualClock;
  let tokens: TokenService;
  let whitelist: AdminWhitelist;
  let register: RegisterUseCase;
  let login: LoginUseCase;
  let refresh: RefreshUseCase;

  beforeEach(() => {
    users = new InMemoryUserRepo();
    clock = new ManualClock();
    tokens = new TokenService(testConfig().auth, clock.now);
    whitelist = new AdminWhitelist({ emails: [], domains: ['admins.test'] });
    register = new RegisterUseCase(users, tokens, whitelist);
    login = new LoginUseCase(users, tokens, whitelist);
    refresh = new RefreshUseCase(users, tokens, whitelist);
  });

  describe('RegisterUseCase', () => {
    it('should store a normalized email and a password hash', async () => {
      const result = await register.execute({
        name: '  Demo  ',
        email: ' Demo@Example.com ',
        password: 'password123',
      });

      const stored = await users.findById(result.userId);
      expect(stored?.name).toBe('Demo');
      expect(stored?.email).toBe('demo@example.com');
      expect(stored?.passwordHash).not.toBe('password123');
      expect(result.email).toBe('demo@example.com');
      expect(result.isAdmin).toBe(false);
    });

    it('should return a token pair for the new user', async () => {
      const result = await register.execute({
        name: 'Demo',
        email: 'demo@example.com',
        password: 'password123',
      });

      const claims = tokens.verify(result.accessToken, 'access');
      expect(claims.sub).toBe(result.userId);
      expect(claims.email).toBe('demo@example.com');
      expect(claims.is_admin).toBe(false);
      expect(tokens.verify(result.refreshToken, 'refresh').sub).toBe(result.userId);
    });

    it('should stamp the admin claim for whitelisted addresses', async () => {
      const result = await register.execute({
        name: 'Boss',
        email: 'boss@admins.test',
        password: 'password123',
      });

      expect(result.isAdmin).toBe(true);
      expect(tokens.verify(result.accessToken, 'access').is_admin).toBe(true);
    });

    it('should reject an email that differs only in case', async () => {
      await register.execute({ name: 'A', email: 'demo@example.com', password: 'password123' });

      await expect(
        register.execute({ name: 'B', email: 'DEMO@example.com', password: 'password123' })
      ).rejects.toThrow(ConflictError);
    });
  });

  describe('LoginUseCase', () => {
    beforeEach(async () => {
      await register.execute({ name: 'Demo', email: 'demo@example.com', password: 'password123' });
    });

    it('should log in with valid credentials', async () => {
      const result = await login.execute({ email: 'Demo@Example.com', password: 'password123' });

      expect(result.email).toBe('demo@example.com');
      expect(tokens.verify(result.accessToken, 'access').sub).toBe(result.userId);
    });

    it('should reject a wrong password', async () => {
      await expect(
        login.execute({ email: 'demo@example.com', password: 'wrong-password' })
      ).rejects.toThrow(new AuthenticationError('Invalid email or password'));
    });

    it('should reject an unknown email with the same message', async () => {
      await expect(
        login.execute({ email: 'nobody@example.com', password: 'password123' })
      ).rejects.toThrow(new AuthenticationError('Invalid email or password'));
    });
  });

  describe('RefreshUseCase', () => {
    it('should issue a new pair for the same subject', async () => {
      const session = await register.execute({
        name: 'Demo',
        email: 'demo@example.com',
        password: 'password123',
      });
      clock.advanceSeconds(60 * 60 + 1);

      const result = await refresh.execute({ refreshToken: session.refreshToken });

      const claims = tokens.verify(result.accessToken, 'access');
      expect(claims.sub).toBe(session.userId);
      expect(claims.iat).toBe(Date.parse('2024-01-01T01:00:01Z') / 1000);
    });

    it('should reject an access token', async () => {
      const session = await register.execute({
        name: 'Demo',
        email: 'demo@example.com',
        password: 'password123',
      });

      await expect(refresh.execute({ refreshToken: session.accessToken })).rejects.toThrow(
        InvalidTokenError
      );
    });

    it('should reject a refresh token whose user is gone', async () => {
      const session = await register.execute({
        name: 'Demo',
        email: 'demo@example.com',
        password: 'password123',
      });
      users.users.delete(session.userId);

      await expect(refresh.execute({ refreshToken: session.refreshToken })).rejects.toThrow(
        new AuthenticationError('Account no longer exists')
      );
    });

    it('should re-resolve the admin claim from the current whitelist', async () => {
      const session = await register.execute({
        name: 'Demo',
        email: 'demo@example.com',
        password: 'password123',
      });
      expect(session.isAdmin).toBe(false);

      const promoted = new RefreshUseCase(
        users,
        tokens,
        new AdminWhitelist({ emails: ['demo@example.com'], domains: [] })
      );
      const result = await promoted.execute({ refreshToken: session.refreshToken });

      expect(result.isAdmin).toBe(true);
      expect(tokens.verify(result.accessToken, 'access').is_admin).toBe(true);
    });
  });
});
