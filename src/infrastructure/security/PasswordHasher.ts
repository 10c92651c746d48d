import { pbkdf2, timingSafeEqual } from 'crypto';
import { promisify } from 'util';
import { HASH_KEY_LENGTH } from '../../constants.js';

const pbkdf2Async = promisify(pbkdf2);

const LEGACY_SEPARATOR = '$';

/**
 * PBKDF2-HMAC-SHA256 password hashing.
 *
 * New hashes use one global salt injected at construction and are stored
 * as bare hex. Hashes written by the older three-column credential layout
 * are stored as `salt_hex$hash_hex` and verified against their own salt.
 */
export class PasswordHasher {
  private readonly globalSalt: Buffer;

  constructor(
    globalSalt: string,
    private readonly iterations: number
  ) {
    this.globalSalt = Buffer.from(globalSalt, 'utf-8');
  }

  async hash(password: string): Promise<string> {
    const derived = await this.derive(password, this.globalSalt);
    return derived.toString('hex');
  }

  /**
   * Verify against either stored form
   */
  async verify(password: string, stored: string): Promise<boolean> {
    if (!stored) {
      return false;
    }

    const separator = stored.indexOf(LEGACY_SEPARATOR);
    if (separator !== -1) {
      const saltHex = stored.slice(0, separator);
      const hashHex = stored.slice(separator + 1);
      if (!isHex(saltHex) || !isHex(hashHex)) {
        return false;
      }
      const derived = await this.derive(password, Buffer.from(saltHex, 'hex'));
      return constantTimeEquals(derived, Buffer.from(hashHex, 'hex'));
    }

    if (!isHex(stored)) {
      return false;
    }
    const derived = await this.derive(password, this.globalSalt);
    return constantTimeEquals(derived, Buffer.from(stored, 'hex'));
  }

  private derive(password: string, salt: Buffer): Promise<Buffer> {
    return pbkdf2Async(password, salt, this.iterations, HASH_KEY_LENGTH, 'sha256');
  }
}

function isHex(value: string): boolean {
  return value.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(value);
}

function constantTimeEquals(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && timingSafeEqual(a, b);
}
