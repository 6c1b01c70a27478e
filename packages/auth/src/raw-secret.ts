import { timingSafeEqual } from 'node:crypto';
import { inspect } from 'node:util';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;
const REDACTED = '[REDACTED]';

/**
 * High-entropy session secret held only in memory.
 * Every string conversion other than toBase64Url() yields a placeholder,
 * so a secret that slips into a log line or a JSON body stays hidden.
 */
export class RawSecret {
  readonly #bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    if (bytes.length === 0) {
      throw new RangeError('RawSecret requires at least one byte');
    }
    this.#bytes = Uint8Array.from(bytes);
  }

  /**
   * Returns null unless the input is canonical unpadded base64url,
   * so decoding recovers the exact bytes that were encoded.
   */
  static fromBase64Url(value: string): RawSecret | null {
    if (!BASE64URL_PATTERN.test(value)) {
      return null;
    }
    const bytes = Buffer.from(value, 'base64url');
    if (bytes.length === 0 || bytes.toString('base64url') !== value) {
      return null;
    }
    return new RawSecret(bytes);
  }

  get byteLength(): number {
    return this.#bytes.length;
  }

  get bytes(): Uint8Array {
    return Uint8Array.from(this.#bytes);
  }

  toBase64Url(): string {
    return Buffer.from(this.#bytes).toString('base64url');
  }

  equals(other: RawSecret): boolean {
    const left = this.#bytes;
    const right = other.bytes;
    return left.length === right.length && timingSafeEqual(left, right);
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return `RawSecret(${REDACTED})`;
  }
}
