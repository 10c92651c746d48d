import { ICredentialRepository } from '../repositories/ICredentialRepository.js';
import { ISessionStore } from '../repositories/ISessionStore.js';
import { MigrationResult, SessionIdentity } from '../entities/Credential.js';
import { ValidationError } from '../../infrastructure/errors/ComplaintDeskError.js';
import { LogSink } from '../../infrastructure/logging/Logger.js';

/**
 * Password policy for new accounts, checked in order
 */
const PASSWORD_RULES: ReadonlyArray<{ test: (password: string) => boolean; message: string }> = [
  { test: p => p.length >= 8, message: 'Password should be at least 8 characters' },
  { test: p => /[A-Z]/.test(p), message: 'Password must include at least one uppercase letter' },
  { test: p => /[a-z]/.test(p), message: 'Password must include at least one lowercase letter' },
  { test: p => /[0-9]/.test(p), message: 'Password must include at least one digit' },
  { test: p => /[^A-Za-z0-9]/.test(p), message: 'Password must include at least one special character' }
];

/**
 * First policy violation, or null
 */
export function checkPasswordPolicy(password: string): string | null {
  const failed = PASSWORD_RULES.find(rule => !rule.test(password));
  return failed ? failed.message : null;
}

/**
 * Authentication Service
 * Sign-up and login over the credential store; on success the identity
 * is handed off through the session store for the intake flow.
 */
export class AuthService {
  constructor(
    private readonly credentials: ICredentialRepository,
    private readonly sessions: ISessionStore,
    private readonly logger: LogSink
  ) {}

  /**
   * Open the credential store, converting legacy layouts
   */
  async initialize(): Promise<MigrationResult> {
    const result = await this.credentials.migrate();
    if (result.status === 'failed') {
      this.logger.error(`Credential store needs attention: ${result.reason}`);
    }
    return result;
  }

  /**
   * @throws ValidationError on missing fields, mismatch or weak password
   * @throws DuplicateUsernameError if the username is taken
   */
  async signup(username: string, password: string, confirm: string): Promise<SessionIdentity> {
    const name = username.trim();
    const secret = password.trim();

    if (!name || !secret || !confirm.trim()) {
      throw new ValidationError('Please fill all fields');
    }
    if (secret !== confirm.trim()) {
      throw new ValidationError('Passwords do not match', 'confirm');
    }
    const policyProblem = checkPasswordPolicy(secret);
    if (policyProblem) {
      throw new ValidationError(policyProblem, 'password');
    }

    await this.credentials.create(name, secret);
    return this.handOff(name);
  }

  /**
   * @throws ValidationError on missing fields or wrong credentials
   */
  async login(username: string, password: string): Promise<SessionIdentity> {
    const name = username.trim();
    const secret = password.trim();

    if (!name || !secret) {
      throw new ValidationError('Please enter username and password');
    }

    if (!(await this.credentials.verify(name, secret))) {
      this.logger.warn(`Failed login for ${name}`);
      throw new ValidationError('Invalid username or password');
    }

    return this.handOff(name);
  }

  async logout(): Promise<void> {
    await this.sessions.clear();
  }

  private async handOff(username: string): Promise<SessionIdentity> {
    const passwordHash = (await this.credentials.getPasswordHash(username)) ?? '';
    const identity: SessionIdentity = { username, passwordHash };
    await this.sessions.write(identity);
    this.logger.info(`Session started for ${username}`);
    return identity;
  }
}
