/**
 * Integers modulo 97
 *
 * 97 is prime, so every nonzero residue has a multiplicative inverse and
 * the residues form a field. Every operation returns a new, frozen value
 * in [0, 96].
 */
import { MODULUS } from '../utils/constants';
import {
  AffineCipherError,
  InvalidResidueError,
  UndefinedInverseError,
} from '../utils/errors';

/**
 * Anything a residue can be built from
 */
export type ResidueLike = number | Residue;

/**
 * An element of Z/97Z
 */
export class Residue {
  static readonly ZERO = new Residue(0);
  static readonly ONE = new Residue(1);

  private constructor(public readonly value: number) {
    Object.freeze(this);
  }

  /**
   * Reduce an integer into [0, 96]. Negative inputs wrap around, so
   * `Residue.from(-1)` is 96.
   */
  static from(input: ResidueLike): Residue {
    if (input instanceof Residue) {
      return input;
    }
    if (!Number.isSafeInteger(input)) {
      throw new InvalidResidueError(input);
    }
    return new Residue(((input % MODULUS) + MODULUS) % MODULUS);
  }

  add(other: ResidueLike): Residue {
    return Residue.from(this.value + Residue.from(other).value);
  }

  subtract(other: ResidueLike): Residue {
    return Residue.from(this.value - Residue.from(other).value);
  }

  multiply(other: ResidueLike): Residue {
    return Residue.from(this.value * Residue.from(other).value);
  }

  negate(): Residue {
    return Residue.from(MODULUS - this.value);
  }

  /**
   * Multiplicative inverse via the extended Euclidean algorithm
   */
  inverse(): Residue {
    if (this.isZero()) {
      throw new UndefinedInverseError();
    }

    let [oldR, r] = [this.value, MODULUS];
    let [oldS, s] = [1, 0];

    while (r !== 0) {
      const q = Math.floor(oldR / r);
      [oldR, r] = [r, oldR - q * r];
      [oldS, s] = [s, oldS - q * s];
    }

    return Residue.from(oldS);
  }

  divide(other: ResidueLike): Residue {
    return this.multiply(Residue.from(other).inverse());
  }

  /**
   * Square-and-multiply. A negative exponent raises the inverse.
   */
  pow(exponent: number): Residue {
    if (!Number.isSafeInteger(exponent)) {
      throw new AffineCipherError(`Exponent ${exponent} is not a safe integer`, 'INVALID_EXPONENT');
    }
    if (exponent < 0) {
      return this.inverse().pow(-exponent);
    }

    let result = Residue.ONE;
    let base: Residue = this;
    let e = exponent;
    while (e > 0) {
      if (e % 2 === 1) {
        result = result.multiply(base);
      }
      base = base.multiply(base);
      e = Math.floor(e / 2);
    }
    return result;
  }

  isZero(): boolean {
    return this.value === 0;
  }

  equals(other: ResidueLike): boolean {
    return this.value === Residue.from(other).value;
  }

  valueOf(): number {
    return this.value;
  }

  toString(): string {
    return `${this.value} (mod ${MODULUS})`;
  }
}

export function add(a: ResidueLike, b: ResidueLike): Residue {
  return Residue.from(a).add(b);
}

export function subtract(a: ResidueLike, b: ResidueLike): Residue {
  return Residue.from(a).subtract(b);
}

export function multiply(a: ResidueLike, b: ResidueLike): Residue {
  return Residue.from(a).multiply(b);
}

export function negate(a: ResidueLike): Residue {
  return Residue.from(a).negate();
}

/**
 * Throws UndefinedInverseError for zero
 */
export function inverse(a: ResidueLike): Residue {
  return Residue.from(a).inverse();
}
