import EventEmitter from 'eventemitter3';
import type { AffineKey, AffineKitConfig, CipherResult } from '../types';
import { assertValidKey, decrypt, encrypt, generateKey } from '../cipher/affine';
import { NaclRandomSource, type RandomSource } from '../cipher/random';
import { Logger, LogLevel, createInstanceLogger } from '../utils/logger';
import { wrapError } from '../utils/errors';
import { VERSION } from '../utils/constants';

/**
 * Event types emitted by AffineKit
 */
export interface AffineKitEvents {
  'key:generated': (key: AffineKey) => void;
  'encrypt:complete': (result: CipherResult) => void;
  'decrypt:complete': (result: CipherResult) => void;
  error: (error: Error) => void;
}

/**
 * AffineKit - runs the cipher with one fixed key
 *
 * The key is either given to the constructor or generated once, on first
 * use, from the configured random source. It never changes afterwards;
 * use a new instance for a different key.
 *
 * @example
 * ```typescript
 * import { AffineKit, createKey } from '@affine97/sdk';
 *
 * const kit = new AffineKit({ key: createKey(5, 8) });
 * kit.encrypt('A'); // 'I'
 * kit.decrypt('I'); // 'A'
 * ```
 */
export class AffineKit extends EventEmitter<AffineKitEvents> {
  private key: AffineKey | null = null;
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(config: AffineKitConfig = {}) {
    super();

    this.random = config.random ?? new NaclRandomSource();
    this.logger = createInstanceLogger(
      config.logLevel ?? (config.debug ? LogLevel.DEBUG : LogLevel.ERROR),
      config.name
    );

    if (config.key) {
      assertValidKey(config.key);
      this.key = config.key;
    }

    this.logger.debug('instance created', {
      version: VERSION,
      hasKey: this.key !== null,
    });
  }

  /**
   * Generate a key from the configured source. The instance keeps its own.
   */
  makeKey(): AffineKey {
    let key: AffineKey;
    try {
      key = generateKey(this.random);
    } catch (error) {
      throw this.fail(error, 'Failed to generate key');
    }
    this.emit('key:generated', key);
    return key;
  }

  /**
   * The instance key, generated on the first call when none was configured
   */
  getKey(): AffineKey {
    if (this.key === null) {
      this.key = this.makeKey();
      this.logger.debug('key generated on first use');
    }
    return this.key;
  }

  hasKey(): boolean {
    return this.key !== null;
  }

  encrypt(plaintext: string): string {
    return this.run('encrypt', plaintext);
  }

  decrypt(ciphertext: string): string {
    return this.run('decrypt', ciphertext);
  }

  private run(operation: CipherResult['operation'], input: string): string {
    const key = this.getKey();

    let output: string;
    try {
      output = operation === 'encrypt' ? encrypt(key, input) : decrypt(key, input);
    } catch (error) {
      throw this.fail(error, `Failed to ${operation}`);
    }

    const result: CipherResult = { operation, length: output.length, output };
    this.logger.debug(`${operation} complete`, { length: result.length });
    if (operation === 'encrypt') {
      this.emit('encrypt:complete', result);
    } else {
      this.emit('decrypt:complete', result);
    }
    return output;
  }

  private fail(error: unknown, message: string): Error {
    const wrapped = wrapError(error, message);
    this.logger.error(message, { code: wrapped.code });
    this.emit('error', wrapped);
    return wrapped;
  }
}

export default AffineKit;
