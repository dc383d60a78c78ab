/**
 * Base error class for Affine97
 */
export class AffineCipherError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'AffineCipherError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Error thrown when the multiplicative part of a key is zero
 */
export class InvalidKeyError extends AffineCipherError {
  constructor(message = 'Key is invalid. Multiplicative part must be non-zero.') {
    super(message, 'INVALID_KEY');
    this.name = 'InvalidKeyError';
  }
}

/**
 * Error thrown when a character is not in the alphabet table
 */
export class UnsupportedCharacterError extends AffineCipherError {
  constructor(
    public readonly character: string,
    public readonly index?: number
  ) {
    const codePoint = character.codePointAt(0);
    const shown =
      codePoint === undefined ? '""' : `U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;
    const msg =
      index !== undefined
        ? `Character ${shown} at position ${index} is not supported`
        : `Character ${shown} is not supported`;
    super(msg, 'UNSUPPORTED_CHARACTER');
    this.name = 'UnsupportedCharacterError';
  }
}

/**
 * Error thrown when inverting the zero residue
 */
export class UndefinedInverseError extends AffineCipherError {
  constructor() {
    super('Zero has no multiplicative inverse modulo 97', 'UNDEFINED_INVERSE');
    this.name = 'UndefinedInverseError';
  }
}

/**
 * Error thrown when a residue is built from something that is not an integer
 */
export class InvalidResidueError extends AffineCipherError {
  constructor(public readonly input: number) {
    super(`Cannot build a residue from ${input}: not a safe integer`, 'INVALID_RESIDUE');
    this.name = 'InvalidResidueError';
  }
}

/**
 * Error thrown when a random source returns a value outside the requested range
 */
export class RandomSourceError extends AffineCipherError {
  constructor(
    public readonly sample: number,
    public readonly min: number,
    public readonly max: number
  ) {
    super(
      `Random source returned ${sample}, expected an integer in [${min}, ${max}]`,
      'INVALID_RANDOM_SAMPLE'
    );
    this.name = 'RandomSourceError';
  }
}

/**
 * Type guard to check if error is an AffineCipherError
 */
export function isAffineCipherError(error: unknown): error is AffineCipherError {
  return error instanceof AffineCipherError;
}

/**
 * Wrap unknown errors in AffineCipherError
 */
export function wrapError(error: unknown, defaultMessage: string): AffineCipherError {
  if (isAffineCipherError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new AffineCipherError(error.message || defaultMessage, 'UNKNOWN_ERROR', error);
  }
  return new AffineCipherError(defaultMessage, 'UNKNOWN_ERROR');
}
