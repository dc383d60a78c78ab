/**
 * SDK version
 */
export const VERSION = '0.1.0';

/**
 * Size of the alphabet and of the residue ring
 */
export const MODULUS = 97;

/**
 * The character table. Position i is the character for residue i.
 * Order is significant: independently built encrypt and decrypt sides
 * must agree on it.
 */
export const ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZ' +
  'abcdefghijklmnopqrstuvwxyz' +
  '0123456789' +
  ' ~-=!@#$%^&*()_+' +
  '[];\',./{}:"<>?`\\|' +
  '\t\n';

/**
 * Ranges drawn from when generating a key (inclusive)
 */
export const KEY_RANGES = {
  MULTIPLIER: { min: 1, max: MODULUS - 1 },
  OFFSET: { min: 0, max: MODULUS - 1 },
} as const;
