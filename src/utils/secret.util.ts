import * as crypto from 'crypto';
import * as argon2 from 'argon2';
import * as bcrypt from 'bcrypt';

export type HashAlgorithm = 'bcrypt' | 'argon2';

export const DEFAULT_SECRET_TAG = 'sk_';
export const KEY_PREFIX_LENGTH = 12;
export const MIN_SECRET_BYTES = 32;
export const BCRYPT_ROUNDS_MIN = 10;
export const BCRYPT_ROUNDS_MAX = 16;
export const DEFAULT_BCRYPT_ROUNDS = 12;

// Leaves at least 8 random characters in every prefix.
export const MAX_SECRET_TAG_LENGTH = 4;
const SECRET_TAG_PATTERN = /^[A-Za-z0-9_-]*$/;

export interface SecretCodecOptions {
  tag?: string;
  secretBytes?: number;
  hashAlgorithm?: HashAlgorithm;
  bcryptRounds?: number;
}

/**
 * Length of every secret issued with this tag and entropy: the tag followed
 * by the unpadded base64url encoding of `secretBytes` random bytes.
 */
export function generatedSecretLength(
  tag: string = DEFAULT_SECRET_TAG,
  secretBytes: number = MIN_SECRET_BYTES,
): number {
  return tag.length + Math.ceil((secretBytes * 4) / 3);
}

/**
 * Returns why a tag cannot be used, or `null` when it can.
 */
export function secretTagProblem(tag: string): string | null {
  if (tag.length > MAX_SECRET_TAG_LENGTH || !SECRET_TAG_PATTERN.test(tag)) {
    return `secretTag must be at most ${MAX_SECRET_TAG_LENGTH} characters of letters, digits, "_" or "-"`;
  }
  return null;
}

/**
 * Issues plaintext secrets and derives everything that is stored about them:
 * the slow hash used for verification and the non-secret lookup prefix.
 */
export class SecretCodec {
  private readonly tag: string;
  private readonly secretBytes: number;
  private readonly hashAlgorithm: HashAlgorithm;
  private readonly bcryptRounds: number;

  constructor(options: SecretCodecOptions = {}) {
    this.tag = options.tag ?? DEFAULT_SECRET_TAG;
    this.secretBytes = options.secretBytes ?? MIN_SECRET_BYTES;
    this.hashAlgorithm = options.hashAlgorithm ?? 'bcrypt';
    this.bcryptRounds = options.bcryptRounds ?? DEFAULT_BCRYPT_ROUNDS;

    const tagProblem = secretTagProblem(this.tag);
    if (tagProblem) {
      throw new RangeError(tagProblem);
    }
    if (!Number.isInteger(this.secretBytes) || this.secretBytes < MIN_SECRET_BYTES) {
      throw new RangeError(`secretBytes must be an integer of at least ${MIN_SECRET_BYTES}`);
    }
    if (
      !Number.isInteger(this.bcryptRounds) ||
      this.bcryptRounds < BCRYPT_ROUNDS_MIN ||
      this.bcryptRounds > BCRYPT_ROUNDS_MAX
    ) {
      throw new RangeError(
        `bcryptRounds must be an integer between ${BCRYPT_ROUNDS_MIN} and ${BCRYPT_ROUNDS_MAX}`,
      );
    }
  }

  get secretLength(): number {
    return generatedSecretLength(this.tag, this.secretBytes);
  }

  /**
   * Generates a URL-safe random secret carrying the issuance tag,
   * e.g. `sk_` followed by 43 base64url characters for 32 bytes.
   */
  generateSecret(): string {
    return `${this.tag}${crypto.randomBytes(this.secretBytes).toString('base64url')}`;
  }

  /**
   * Salted hash with the configured algorithm. The encoding carries the salt
   * and cost, so `verifySecret` needs nothing else.
   */
  async hashSecret(plaintext: string): Promise<string> {
    if (this.hashAlgorithm === 'argon2') {
      return argon2.hash(plaintext);
    }
    return bcrypt.hash(plaintext, this.bcryptRounds);
  }

  /**
   * Verifies with the algorithm the stored hash was made with, whatever the
   * codec is configured to issue. A malformed hash never matches.
   */
  async verifySecret(plaintext: string, hash: string): Promise<boolean> {
    try {
      if (hash.startsWith('$argon2')) {
        return await argon2.verify(hash, plaintext);
      }
      return await bcrypt.compare(plaintext, hash);
    } catch {
      return false;
    }
  }

  /**
   * Index only. Knowing the prefix must never be enough to authenticate.
   */
  extractPrefix(plaintext: string): string {
    return plaintext.substring(0, KEY_PREFIX_LENGTH);
  }
}
