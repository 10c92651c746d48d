import { MigrationResult } from '../entities/Credential.js';

/**
 * Credential Repository Interface
 * Persists username → password-hash rows
 */
export interface ICredentialRepository {
  /**
   * Create the store if missing and convert legacy column layouts.
   * Never throws; failures come back as `{ status: 'failed' }`.
   */
  migrate(): Promise<MigrationResult>;

  /**
   * Exact, case-sensitive match
   */
  exists(username: string): Promise<boolean>;

  /**
   * Hash the password and append a row
   * @throws DuplicateUsernameError if the username is taken
   */
  create(username: string, password: string): Promise<void>;

  /**
   * First matching row wins; false when the user is unknown
   */
  verify(username: string, password: string): Promise<boolean>;

  /**
   * Stored hash of the first matching row, or null
   */
  getPasswordHash(username: string): Promise<string | null>;
}
