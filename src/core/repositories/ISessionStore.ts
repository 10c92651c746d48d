import { SessionIdentity } from '../entities/Credential.js';

/**
 * Session Store Interface
 * Hands the authenticated identity to the intake flow
 */
export interface ISessionStore {
  /**
   * Overwrites any earlier session
   */
  write(identity: SessionIdentity): Promise<void>;

  /**
   * Handed-off identity, or null when none is available
   */
  read(): Promise<SessionIdentity | null>;

  clear(): Promise<void>;
}
