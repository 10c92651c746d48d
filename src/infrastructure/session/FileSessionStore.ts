import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { ISessionStore } from '../../core/repositories/ISessionStore.js';
import { SessionIdentity } from '../../core/entities/Credential.js';
import { StorageError, isErrnoException } from '../errors/ComplaintDeskError.js';
import { LogSink } from '../logging/Logger.js';

const SessionFileSchema = z.object({
  username: z.string(),
  password_hash: z.string()
});

/**
 * Session handoff through a small JSON file, with an environment fallback
 * for callers that pass the identity in instead.
 */
export class FileSessionStore implements ISessionStore {
  constructor(
    private readonly path: string,
    private readonly logger: LogSink,
    private readonly fallback: SessionIdentity | null = null
  ) {}

  async write(identity: SessionIdentity): Promise<void> {
    const body = JSON.stringify({ username: identity.username, password_hash: identity.passwordHash });
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, body, 'utf-8');
    } catch (error) {
      throw new StorageError(this.path, 'Failed to write session file', error);
    }
    this.logger.debug(`Session handed off for ${identity.username}`);
  }

  async read(): Promise<SessionIdentity | null> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return this.fallback;
      }
      throw new StorageError(this.path, 'Failed to read session file', error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new StorageError(this.path, 'Session file is not valid JSON', error);
    }

    const result = SessionFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(this.path, 'Session file is missing username or password_hash');
    }

    return { username: result.data.username, passwordHash: result.data.password_hash };
  }

  async clear(): Promise<void> {
    try {
      await rm(this.path, { force: true });
    } catch (error) {
      throw new StorageError(this.path, 'Failed to remove session file', error);
    }
  }
}
