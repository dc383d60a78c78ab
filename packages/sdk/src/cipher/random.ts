import nacl from 'tweetnacl';
import { AffineCipherError } from '../utils/errors';

/**
 * Source of uniformly distributed integers.
 * Injected into key generation so tests can substitute a fixed sequence.
 */
export interface RandomSource {
  /** Integer in [min, max], both inclusive */
  randomInt(min: number, max: number): number;
}

const UINT32_RANGE = 0x1_0000_0000;

function assertRange(min: number, max: number): void {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min > max) {
    throw new AffineCipherError(`Invalid range [${min}, ${max}]`, 'INVALID_RANGE');
  }
  if (max - min + 1 > UINT32_RANGE) {
    throw new AffineCipherError(`Range [${min}, ${max}] exceeds 2^32 values`, 'INVALID_RANGE');
  }
}

/**
 * Random source backed by tweetnacl's CSPRNG
 *
 * Uses rejection sampling over 32-bit draws so no value in the range is
 * favoured by modulo bias.
 */
export class NaclRandomSource implements RandomSource {
  randomInt(min: number, max: number): number {
    assertRange(min, max);

    const span = max - min + 1;
    const limit = UINT32_RANGE - (UINT32_RANGE % span);

    for (;;) {
      const bytes = nacl.randomBytes(4);
      const value = bytes[0] * 0x100_0000 + bytes[1] * 0x1_0000 + bytes[2] * 0x100 + bytes[3];
      if (value < limit) {
        return min + (value % span);
      }
    }
  }
}

/**
 * Deterministic source that replays a fixed list of values, cycling when
 * exhausted. Values are returned as given, whatever range was asked for.
 */
export class SequenceRandomSource implements RandomSource {
  private readonly values: readonly number[];
  private position = 0;

  constructor(values: readonly number[]) {
    if (values.length === 0) {
      throw new AffineCipherError('Sequence must contain at least one value', 'EMPTY_SEQUENCE');
    }
    this.values = [...values];
  }

  randomInt(min: number, max: number): number {
    assertRange(min, max);
    const value = this.values[this.position % this.values.length];
    this.position++;
    return value;
  }

  /**
   * Number of values drawn so far
   */
  get drawn(): number {
    return this.position;
  }
}

/**
 * Shared default source
 */
export const defaultRandomSource: RandomSource = new NaclRandomSource();
