/**
 * Character codec
 *
 * Bijection between the 97 symbols of ALPHABET and the residues modulo 97.
 */
import { ALPHABET, MODULUS } from '../utils/constants';
import { AffineCipherError, UnsupportedCharacterError } from '../utils/errors';
import { Residue } from '../math/residue';

const SYMBOLS: readonly string[] = Object.freeze(Array.from(ALPHABET));

if (SYMBOLS.length !== MODULUS || new Set(SYMBOLS).size !== MODULUS) {
  throw new AffineCipherError(
    `Alphabet must hold ${MODULUS} distinct symbols, found ${SYMBOLS.length}`,
    'INVALID_ALPHABET'
  );
}

const INDEX: ReadonlyMap<string, number> = new Map(SYMBOLS.map((ch, i) => [ch, i]));

/**
 * The ordered symbol table
 */
export function getAlphabet(): readonly string[] {
  return SYMBOLS;
}

export function isSupportedCharacter(ch: string): boolean {
  return INDEX.has(ch);
}

/**
 * Residue for a single character.
 * `index` is only used to report where an unsupported character sits.
 */
export function characterToResidue(ch: string, index?: number): Residue {
  const position = INDEX.get(ch);
  if (position === undefined) {
    throw new UnsupportedCharacterError(ch, index);
  }
  return Residue.from(position);
}

export function residueToCharacter(r: Residue): string {
  return SYMBOLS[r.value];
}

/**
 * First character of `text` outside the alphabet, or null.
 * Positions count code points, not UTF-16 units.
 */
export function findUnsupportedCharacter(
  text: string
): { character: string; index: number } | null {
  let index = 0;
  for (const character of text) {
    if (!INDEX.has(character)) {
      return { character, index };
    }
    index++;
  }
  return null;
}
