import { copyFile } from 'fs/promises';
import { ICredentialRepository } from '../../core/repositories/ICredentialRepository.js';
import { Credential, MigrationResult } from '../../core/entities/Credential.js';
import { DuplicateUsernameError, MigrationError, errorMessage } from '../errors/ComplaintDeskError.js';
import { PasswordHasher } from '../security/PasswordHasher.js';
import { LogSink } from '../logging/Logger.js';
import { appendCsvRows, readCsv, writeCsv } from './CsvFile.js';
import { SerialQueue } from './SerialQueue.js';

export const CREDENTIAL_HEADER = ['username', 'password'] as const;

// Column names of the older username,salt,pwd_hash layout
const LEGACY_SALT_COLUMN = 'salt';
const LEGACY_HASH_COLUMNS = ['pwd_hash', 'hash', 'pwdhash'];

/**
 * Flat-file implementation of the credential store.
 *
 * Current layout is `username,password`. The older `username,salt,pwd_hash`
 * layout is still readable and is rewritten by {@link migrate}, which keeps
 * a byte-identical backup of the original file. Writes go through the
 * repository's queue, so the check for a taken username and the append
 * that follows it are never split by another sign-up.
 */
export class CsvCredentialRepository implements ICredentialRepository {
  private readonly queue = new SerialQueue();

  constructor(
    private readonly path: string,
    private readonly hasher: PasswordHasher,
    private readonly logger: LogSink,
    private readonly now: () => Date = () => new Date()
  ) {}

  migrate(): Promise<MigrationResult> {
    return this.queue.run(() => this.migrateFile());
  }

  create(username: string, password: string): Promise<void> {
    return this.queue.run(() => this.createUser(username, password));
  }

  private async migrateFile(): Promise<MigrationResult> {
    try {
      const rows = await readCsv(this.path);

      if (rows === null || rows.length === 0) {
        await writeCsv(this.path, CREDENTIAL_HEADER, []);
        this.logger.info(`Created credential file ${this.path}`);
        return { status: 'created' };
      }

      const [header, ...records] = rows;
      const columns = header.map(normalizeColumn);
      const hashIndex = columns.findIndex(column => LEGACY_HASH_COLUMNS.includes(column));

      if (!columns.includes(LEGACY_SALT_COLUMN) && !columns.includes('pwd_hash')) {
        return { status: 'not-needed' };
      }

      const usernameIndex = columns.indexOf('username');
      const saltIndex = columns.indexOf(LEGACY_SALT_COLUMN);
      if (usernameIndex === -1 || saltIndex === -1 || hashIndex === -1) {
        throw new MigrationError(`Unrecognised legacy credential header: ${header.join(',')}`);
      }

      const migrated = records.map(record => [
        cell(record, usernameIndex),
        `${cell(record, saltIndex)}$${cell(record, hashIndex)}`
      ]);

      const backupPath = `${this.path}.bak.${Math.floor(this.now().getTime() / 1000)}`;
      await copyFile(this.path, backupPath);
      await writeCsv(this.path, CREDENTIAL_HEADER, migrated);

      this.logger.info(`Migrated ${migrated.length} credential rows to username,password`, { backupPath });
      return { status: 'migrated', backupPath, migratedRows: migrated.length };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(`Credential migration failed, file left untouched: ${reason}`);
      return { status: 'failed', reason };
    }
  }

  async exists(username: string): Promise<boolean> {
    const credentials = await this.readAll();
    return credentials.some(credential => credential.username === username);
  }

  private async createUser(username: string, password: string): Promise<void> {
    if (await this.exists(username)) {
      throw new DuplicateUsernameError(username);
    }

    const passwordHash = await this.hasher.hash(password);

    if ((await readCsv(this.path)) === null) {
      await writeCsv(this.path, CREDENTIAL_HEADER, []);
    }
    await appendCsvRows(this.path, [[username, passwordHash]]);

    this.logger.info(`Created user ${username}`);
  }

  async verify(username: string, password: string): Promise<boolean> {
    const stored = await this.getPasswordHash(username);
    if (stored === null) {
      return false;
    }
    return this.hasher.verify(password, stored);
  }

  async getPasswordHash(username: string): Promise<string | null> {
    const credentials = await this.readAll();
    const match = credentials.find(credential => credential.username === username);
    return match ? match.passwordHash : null;
  }

  /**
   * Read every row, accepting the current layout, the legacy
   * salt/hash layout, or bare positional columns
   */
  private async readAll(): Promise<Credential[]> {
    const rows = await readCsv(this.path);
    if (rows === null || rows.length === 0) {
      return [];
    }

    const [header, ...records] = rows;
    const columns = header.map(normalizeColumn);
    const usernameIndex = columns.indexOf('username');
    const passwordIndex = columns.indexOf('password');
    const saltIndex = columns.indexOf(LEGACY_SALT_COLUMN);
    const legacyHashIndex = columns.indexOf('pwd_hash');

    if (usernameIndex !== -1 && passwordIndex !== -1) {
      return records.map(record => ({
        username: cell(record, usernameIndex),
        passwordHash: cell(record, passwordIndex)
      }));
    }

    if (usernameIndex !== -1 && saltIndex !== -1 && legacyHashIndex !== -1) {
      return records.map(record => ({
        username: cell(record, usernameIndex),
        passwordHash: `${cell(record, saltIndex)}$${cell(record, legacyHashIndex)}`
      }));
    }

    // Unknown header: first two columns of each remaining row
    return records
      .filter(record => record.length >= 1)
      .map(record => ({ username: cell(record, 0), passwordHash: cell(record, 1) }));
  }
}

function normalizeColumn(column: string): string {
  return column.trim().toLowerCase();
}

function cell(record: readonly string[], index: number): string {
  return index >= 0 && index < record.length ? record[index].trim() : '';
}
