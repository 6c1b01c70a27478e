import { randomUUID } from 'node:crypto';
import type { IdentifierGenerator } from './interfaces.js';

export class UuidIdentifierGenerator implements IdentifierGenerator {
  next(): string {
    return randomUUID();
  }
}

/**
 * Predictable v4-shaped ids: 00000000-0000-4000-8000-000000000001, ...002, ...
 */
export class SequentialIdentifierGenerator implements IdentifierGenerator {
  private counter = 0;

  next(): string {
    this.counter += 1;
    return `00000000-0000-4000-8000-${this.counter.toString(16).padStart(12, '0')}`;
  }
}
