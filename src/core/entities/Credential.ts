/**
 * Credential Entity
 * One row of the credential file
 */
export interface Credential {
  /** Unique, case-sensitive */
  readonly username: string;

  /** Either `salt_hex$hash_hex` (legacy per-user salt) or a bare hash_hex (global salt) */
  readonly passwordHash: string;
}

/**
 * Identity handed from the authentication tools to the intake tools
 */
export interface SessionIdentity {
  readonly username: string;
  readonly passwordHash: string;
}

/**
 * Outcome of opening the credential file
 */
export type MigrationResult =
  | { readonly status: 'not-needed' }
  | { readonly status: 'created' }
  | { readonly status: 'migrated'; readonly backupPath: string; readonly migratedRows: number }
  | { readonly status: 'failed'; readonly reason: string };
