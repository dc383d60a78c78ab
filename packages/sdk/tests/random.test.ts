import { describe, it, expect } from 'vitest';
import { NaclRandomSource, SequenceRandomSource } from '../src/cipher/random';
import { AffineCipherError } from '../src/utils/errors';
import { thrown } from './helpers';

describe('NaclRandomSource', () => {
  const source = new NaclRandomSource();

  it('stays within inclusive bounds', () => {
    for (let i = 0; i < 1000; i++) {
      const value = source.randomInt(1, 96);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(96);
    }
  });

  it('reaches both ends of a small range', () => {
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      seen.add(source.randomInt(0, 1));
    }
    expect([...seen].sort((a, b) => a - b)).toEqual([0, 1]);
  });

  it('returns the only value of a single-value range', () => {
    expect(source.randomInt(5, 5)).toBe(5);
  });

  it('rejects invalid ranges', () => {
    expect(thrown(() => source.randomInt(3, 1))).toMatchObject({ code: 'INVALID_RANGE' });
    expect(() => source.randomInt(0, 1.5)).toThrow(AffineCipherError);
    expect(() => source.randomInt(0, 2 ** 33)).toThrow(AffineCipherError);
  });
});

describe('SequenceRandomSource', () => {
  it('replays values in order and cycles', () => {
    const source = new SequenceRandomSource([4, 9, 2]);
    const drawn = Array.from({ length: 5 }, () => source.randomInt(0, 96));
    expect(drawn).toEqual([4, 9, 2, 4, 9]);
    expect(source.drawn).toBe(5);
  });

  it('does not share state with the input array', () => {
    const values = [1, 2];
    const source = new SequenceRandomSource(values);
    values[0] = 50;
    expect(source.randomInt(0, 96)).toBe(1);
  });

  it('requires at least one value', () => {
    expect(thrown(() => new SequenceRandomSource([]))).toMatchObject({ code: 'EMPTY_SEQUENCE' });
  });
});
