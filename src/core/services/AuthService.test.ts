import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { AuthService, checkPasswordPolicy } from './AuthService.js';
import { CsvCredentialRepository } from '../../infrastructure/storage/CsvCredentialRepository.js';
import { PasswordHasher } from '../../infrastructure/security/PasswordHasher.js';
import { DuplicateUsernameError, ValidationError } from '../../infrastructure/errors/ComplaintDeskError.js';
import {
  InMemorySessionStore,
  TEST_ITERATIONS,
  TEST_SALT,
  makeTempDir,
  removeTempDir,
  silentLogger
} from '../../testing/helpers.js';

describe('checkPasswordPolicy', () => {
  it('reports the first rule that fails', () => {
    expect(checkPasswordPolicy('Ab1#')).toBe('Password should be at least 8 characters');
    expect(checkPasswordPolicy('abcdefg1#')).toBe('Password must include at least one uppercase letter');
    expect(checkPasswordPolicy('ABCDEFG1#')).toBe('Password must include at least one lowercase letter');
    expect(checkPasswordPolicy('Abcdefgh#')).toBe('Password must include at least one digit');
    expect(checkPasswordPolicy('Abcdefgh1')).toBe('Password must include at least one special character');
  });

  it('accepts a password meeting every rule', () => {
    expect(checkPasswordPolicy('Secret#123')).toBeNull();
  });
});

describe('AuthService', () => {
  let dir: string;
  let credentials: CsvCredentialRepository;
  let sessions: InMemorySessionStore;
  let auth: AuthService;

  beforeEach(async () => {
    dir = await makeTempDir();
    credentials = new CsvCredentialRepository(
      join(dir, 'users.csv'),
      new PasswordHasher(TEST_SALT, TEST_ITERATIONS),
      silentLogger()
    );
    sessions = new InMemorySessionStore();
    auth = new AuthService(credentials, sessions, silentLogger());
    await auth.initialize();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('signup', () => {
    it('creates the account and hands off the stored hash', async () => {
      const identity = await auth.signup('meena', 'Secret#123', 'Secret#123');

      const stored = await credentials.getPasswordHash('meena');
      expect(identity).toEqual({ username: 'meena', passwordHash: stored });
      expect(await sessions.read()).toEqual(identity);
    });

    it('trims surrounding spaces before storing', async () => {
      await auth.signup('  meena ', ' Secret#123 ', 'Secret#123');

      expect(await credentials.verify('meena', 'Secret#123')).toBe(true);
    });

    it('requires every field', async () => {
      await expect(auth.signup('meena', 'Secret#123', '   ')).rejects.toThrow('Please fill all fields');
    });

    it('requires matching passwords', async () => {
      await expect(auth.signup('meena', 'Secret#123', 'Secret#124')).rejects.toThrow('Passwords do not match');
    });

    it('enforces the password policy', async () => {
      await expect(auth.signup('meena', 'secret#123', 'secret#123')).rejects.toThrow(
        'Password must include at least one uppercase letter'
      );
      expect(await credentials.exists('meena')).toBe(false);
    });

    it('rejects a taken username', async () => {
      await auth.signup('meena', 'Secret#123', 'Secret#123');

      await expect(auth.signup('meena', 'Other#4567', 'Other#4567')).rejects.toBeInstanceOf(DuplicateUsernameError);
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await auth.signup('meena', 'Secret#123', 'Secret#123');
      await auth.logout();
    });

    it('starts a session on correct credentials', async () => {
      const identity = await auth.login('meena', 'Secret#123');

      expect(identity.username).toBe('meena');
      expect(await sessions.read()).toEqual(identity);
    });

    it('gives the same message for a wrong password and an unknown user', async () => {
      await expect(auth.login('meena', 'Secret#999')).rejects.toThrow('Invalid username or password');
      await expect(auth.login('nobody', 'Secret#123')).rejects.toThrow('Invalid username or password');
      expect(await sessions.read()).toBeNull();
    });

    it('requires both fields', async () => {
      await expect(auth.login('', 'Secret#123')).rejects.toBeInstanceOf(ValidationError);
      await expect(auth.login('meena', ' ')).rejects.toThrow('Please enter username and password');
    });
  });
});
