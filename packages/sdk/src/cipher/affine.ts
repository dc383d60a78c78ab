/**
 * Affine cipher engine
 *
 * Encrypts each character independently with y = m*x + b (mod 97) and
 * decrypts with x = m⁻¹ * (y - b) (mod 97). Every function here is pure
 * apart from generateKey, which draws from the injected random source.
 */
import type { AffineKey } from '../types';
import { Residue, type ResidueLike } from '../math/residue';
import { characterToResidue, residueToCharacter } from '../codec/alphabet';
import { InvalidKeyError, RandomSourceError } from '../utils/errors';
import { KEY_RANGES } from '../utils/constants';
import { defaultRandomSource, type RandomSource } from './random';

/**
 * Build a key from its multiplicative and additive parts.
 * Values are reduced modulo 97; validity is not checked here.
 */
export function createKey(m: ResidueLike, b: ResidueLike): AffineKey {
  return Object.freeze({ m: Residue.from(m), b: Residue.from(b) });
}

/**
 * A key is valid when its multiplicative part is non-zero
 */
export function validateKey(key: AffineKey): boolean {
  return !key.m.isZero();
}

export function assertValidKey(key: AffineKey): void {
  if (!validateKey(key)) {
    throw new InvalidKeyError();
  }
}

function draw(random: RandomSource, range: { min: number; max: number }): number {
  const sample = random.randomInt(range.min, range.max);
  if (!Number.isSafeInteger(sample) || sample < range.min || sample > range.max) {
    throw new RandomSourceError(sample, range.min, range.max);
  }
  return sample;
}

/**
 * Random valid key: m in [1, 96], b in [0, 96]
 */
export function generateKey(random: RandomSource = defaultRandomSource): AffineKey {
  const m = draw(random, KEY_RANGES.MULTIPLIER);
  const b = draw(random, KEY_RANGES.OFFSET);
  return createKey(m, b);
}

/**
 * The key whose encryption undoes `key`: (m⁻¹, -m⁻¹·b)
 */
export function invertKey(key: AffineKey): AffineKey {
  assertValidKey(key);
  const mInv = key.m.inverse();
  return createKey(mInv, mInv.multiply(key.b).negate());
}

export function encryptResidue(key: AffineKey, x: Residue): Residue {
  assertValidKey(key);
  return key.m.multiply(x).add(key.b);
}

export function decryptResidue(key: AffineKey, y: Residue): Residue {
  assertValidKey(key);
  return key.m.inverse().multiply(y.add(key.b.negate()));
}

function transform(text: string, fn: (r: Residue) => Residue): string {
  const out: string[] = [];
  let index = 0;
  for (const ch of text) {
    out.push(residueToCharacter(fn(characterToResidue(ch, index))));
    index++;
  }
  return out.join('');
}

/**
 * Encrypt character by character.
 *
 * @throws InvalidKeyError before reading any input when m is zero
 * @throws UnsupportedCharacterError at the first character outside the alphabet
 */
export function encrypt(key: AffineKey, plaintext: string): string {
  assertValidKey(key);

  const { m, b } = key;

  // y = mx + b
  return transform(plaintext, (x) => m.multiply(x).add(b));
}

/**
 * Decrypt character by character.
 *
 * @throws InvalidKeyError before reading any input when m is zero
 * @throws UnsupportedCharacterError at the first character outside the alphabet
 */
export function decrypt(key: AffineKey, ciphertext: string): string {
  assertValidKey(key);

  const mInv = key.m.inverse();
  const negB = key.b.negate();

  // x = (y - b) / m
  return transform(ciphertext, (y) => mInv.multiply(y.add(negB)));
}

/**
 * Random valid key from the shared tweetnacl-backed source
 */
export function makeKey(): AffineKey {
  return generateKey(defaultRandomSource);
}
