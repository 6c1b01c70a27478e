import { randomBytes } from 'node:crypto';
import { GenerationError } from './errors.js';
import { RawSecret } from './raw-secret.js';

export interface TokenGenerator {
  /**
   * Produce ceil(bits / 8) bytes from a cryptographically secure source.
   * @throws {GenerationError} if `bits` is not a positive integer or the entropy source fails
   */
  generate(bits: number): RawSecret;
}

export type EntropySource = (size: number) => Uint8Array;

export class CryptoTokenGenerator implements TokenGenerator {
  constructor(private readonly source: EntropySource = randomBytes) {}

  generate(bits: number): RawSecret {
    if (!Number.isInteger(bits) || bits <= 0) {
      throw new GenerationError(`Secret length must be a positive number of bits, got ${bits}`);
    }

    const size = Math.ceil(bits / 8);
    let bytes: Uint8Array;
    try {
      bytes = this.source(size);
    } catch (error) {
      throw new GenerationError('Entropy source is unavailable', { cause: error });
    }

    if (bytes.length !== size) {
      throw new GenerationError(`Entropy source returned ${bytes.length} bytes, expected ${size}`);
    }

    return new RawSecret(bytes);
  }
}
