/**
 * Numeric primitives: arbitrary-precision integers, field elements and
 * row indices.
 */

/** Arbitrary-precision integer used before values are reduced into the field. */
export type AbstractNumber = bigint;

/** Type of polynomial degrees, row indices and array lengths. */
export type DegreeType = number;

/** The Goldilocks prime 2^64 - 2^32 + 1. */
export const MODULUS: bigint = 0xffffffff00000001n;

function reduce(value: bigint): bigint {
  const r = value % MODULUS;
  return r < 0n ? r + MODULUS : r;
}

/**
 * Immutable element of the prime field. Values are kept in canonical form
 * in [0, MODULUS).
 */
export class FieldElement {
  static readonly ZERO = new FieldElement(0n);
  static readonly ONE = new FieldElement(1n);

  private constructor(private readonly value: bigint) {}

  static from(value: AbstractNumber | number): FieldElement {
    return new FieldElement(reduce(typeof value === "number" ? BigInt(value) : value));
  }

  /** Parses a decimal or 0x-prefixed hex literal, optionally negated. */
  static parse(text: string): FieldElement {
    const trimmed = text.trim();
    const negative = trimmed.startsWith("-");
    const digits = negative ? trimmed.slice(1) : trimmed;
    if (!/^(?:0x[0-9a-fA-F]+|[0-9]+)$/.test(digits)) {
      throw new Error(`Invalid number literal: '${text}'`);
    }
    const v = BigInt(digits);
    return FieldElement.from(negative ? -v : v);
  }

  add(other: FieldElement): FieldElement {
    return new FieldElement(reduce(this.value + other.value));
  }

  sub(other: FieldElement): FieldElement {
    return new FieldElement(reduce(this.value - other.value));
  }

  mul(other: FieldElement): FieldElement {
    return new FieldElement(reduce(this.value * other.value));
  }

  neg(): FieldElement {
    return new FieldElement(reduce(-this.value));
  }

  pow(exponent: bigint): FieldElement {
    if (exponent < 0n) {
      return this.inverse().pow(-exponent);
    }
    let result = 1n;
    let base = this.value;
    let e = exponent;
    while (e > 0n) {
      if (e & 1n) result = (result * base) % MODULUS;
      base = (base * base) % MODULUS;
      e >>= 1n;
    }
    return new FieldElement(result);
  }

  inverse(): FieldElement {
    if (this.isZero()) {
      throw new Error("Division by zero in field.");
    }
    return this.pow(MODULUS - 2n);
  }

  div(other: FieldElement): FieldElement {
    return this.mul(other.inverse());
  }

  // Integer operations on the canonical representative.

  and(other: FieldElement): FieldElement {
    return new FieldElement(this.value & other.value);
  }

  or(other: FieldElement): FieldElement {
    return new FieldElement(reduce(this.value | other.value));
  }

  xor(other: FieldElement): FieldElement {
    return new FieldElement(reduce(this.value ^ other.value));
  }

  shl(bits: FieldElement): FieldElement {
    return new FieldElement(reduce(this.value << bits.value));
  }

  shr(bits: FieldElement): FieldElement {
    return new FieldElement(this.value >> bits.value);
  }

  mod(other: FieldElement): FieldElement {
    if (other.isZero()) {
      throw new Error("Modulo by zero.");
    }
    return new FieldElement(this.value % other.value);
  }

  isZero(): boolean {
    return this.value === 0n;
  }

  equals(other: FieldElement): boolean {
    return this.value === other.value;
  }

  toBigInt(): bigint {
    return this.value;
  }

  toDegree(): DegreeType {
    if (this.value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new Error(`Value ${this.value} does not fit a row index.`);
    }
    return Number(this.value);
  }

  toString(): string {
    return this.value.toString();
  }
}
