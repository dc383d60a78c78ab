import type { Residue } from '../math/residue';
import type { RandomSource } from '../cipher/random';
import type { LogLevel } from '../utils/logger';

/**
 * Affine key (m, b) for y = m*x + b (mod 97)
 */
export interface AffineKey {
  /** Multiplicative part (slope). Must be non-zero for the key to be valid */
  readonly m: Residue;
  /** Additive part (intercept) */
  readonly b: Residue;
}

/**
 * Configuration for an AffineKit instance
 */
export interface AffineKitConfig {
  /** Key for the instance's lifetime. One is generated on first use when omitted */
  key?: AffineKey;
  /** Source for key generation (defaults to tweetnacl's CSPRNG) */
  random?: RandomSource;
  /** Enable debug logging */
  debug?: boolean;
  /** Log level, takes precedence over `debug`. Defaults to ERROR */
  logLevel?: LogLevel;
  /** Name shown in this instance's log prefix */
  name?: string;
}

/**
 * Result of an encrypt or decrypt call on AffineKit
 */
export interface CipherResult {
  operation: 'encrypt' | 'decrypt';
  /** Number of characters processed */
  length: number;
  output: string;
}
