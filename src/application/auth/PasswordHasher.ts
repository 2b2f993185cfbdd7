// Application: Password hashing
// PBKDF2-HMAC-SHA256 digests with per-user salt and iteration count

import { pbkdf2, randomBytes, timingSafeEqual } from 'crypto';
import { promisify } from 'util';
import type { IPasswordHasher } from '@/domain/user/repository.js';

const pbkdf2Async = promisify(pbkdf2);

export const DEFAULT_ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const SALT_BYTES = 32;
const DIGEST = 'sha256';
const HEX_PATTERN = /^[0-9a-f]+$/i;

export class PasswordHasher implements IPasswordHasher {
  constructor(readonly iterations: number = DEFAULT_ITERATIONS) {}

  /**
   * Derive the hex digest for (password, salt, iterations)
   */
  async hash(password: string, salt: string, iterations: number): Promise<string> {
    const key = await pbkdf2Async(
      Buffer.from(password, 'utf8'),
      Buffer.from(salt, 'utf8'),
      iterations,
      KEY_LENGTH,
      DIGEST
    );
    return key.toString('hex');
  }

  /**
   * 256 bits from the CSPRNG, hex encoded
   */
  generateSalt(): string {
    return randomBytes(SALT_BYTES).toString('hex');
  }

  /**
   * Recompute and compare in constant time.
   * Malformed stored digests compare as a mismatch.
   */
  async verify(password: string, salt: string, iterations: number, digest: string): Promise<boolean> {
    const computed = Buffer.from(await this.hash(password, salt, iterations), 'hex');

    if (!HEX_PATTERN.test(digest) || digest.length !== computed.length * 2) {
      return false;
    }

    return timingSafeEqual(computed, Buffer.from(digest, 'hex'));
  }

  /**
   * Whether a stored digest was made with fewer iterations than configured
   */
  needsRehash(iterations: number): boolean {
    return iterations < this.iterations;
  }
}
