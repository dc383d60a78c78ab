/**
 * Affine97 SDK
 *
 * An affine substitution cipher over a fixed 97-character alphabet.
 * Educational only: a single-alphabet substitution falls to frequency
 * analysis and offers no real confidentiality.
 *
 * @packageDocumentation
 */

// Main SDK class
export { AffineKit, type AffineKitEvents } from './core/affinekit';

// Re-export default
export { default } from './core/affinekit';

// Types
export type { AffineKey, AffineKitConfig, CipherResult } from './types';

// Cipher engine
export {
  createKey,
  validateKey,
  assertValidKey,
  generateKey,
  makeKey,
  invertKey,
  encrypt,
  decrypt,
  encryptResidue,
  decryptResidue,
} from './cipher/affine';

// Randomness
export {
  type RandomSource,
  NaclRandomSource,
  SequenceRandomSource,
  defaultRandomSource,
} from './cipher/random';

// Residues modulo 97
export {
  Residue,
  type ResidueLike,
  add,
  subtract,
  multiply,
  negate,
  inverse,
} from './math/residue';

// Character codec
export {
  getAlphabet,
  isSupportedCharacter,
  characterToResidue,
  residueToCharacter,
  findUnsupportedCharacter,
} from './codec/alphabet';

// Errors
export {
  AffineCipherError,
  InvalidKeyError,
  UnsupportedCharacterError,
  UndefinedInverseError,
  InvalidResidueError,
  RandomSourceError,
  isAffineCipherError,
  wrapError,
} from './utils/errors';

// Logger
export { Logger, LogLevel, createInstanceLogger, type LoggerConfig, type LogContext } from './utils/logger';

// Constants
export { VERSION, MODULUS, ALPHABET, KEY_RANGES } from './utils/constants';
