/**
 * Bit constraints: knowledge that every set bit of a value lies within a mask.
 */
import { FieldElement, MODULUS } from "@pilkit/core";

export interface BitConstraint {
  readonly mask: bigint;
}

const FIELD_BITS = MODULUS.toString(2).length;

function bitLength(value: bigint): number {
  return value === 0n ? 0 : value.toString(2).length;
}

/** A value fitting in `bits` bits. */
export function fromMaxBitCount(bits: number): BitConstraint {
  return { mask: (1n << BigInt(bits)) - 1n };
}

/** The smallest all-ones mask covering `value`. */
export function fromValue(value: bigint): BitConstraint {
  return fromMaxBitCount(bitLength(value));
}

/** `(1 << k) - 1` style masks are the usual ones, but any mask is allowed. */
export function fromMask(mask: bigint): BitConstraint {
  return { mask };
}

/**
 * The constraint of `factor * x` given that `x` satisfies `constraint`.
 * Only defined for power-of-two factors whose shifted mask still fits below
 * the modulus.
 */
export function multiple(constraint: BitConstraint, factor: FieldElement): BitConstraint | undefined {
  const f = factor.toBigInt();
  if (f === 0n || (f & (f - 1n)) !== 0n) return undefined;
  const mask = constraint.mask << BigInt(bitLength(f) - 1);
  if (bitLength(mask) >= FIELD_BITS) return undefined;
  return { mask };
}

export function overlaps(a: BitConstraint, b: BitConstraint): boolean {
  return (a.mask & b.mask) !== 0n;
}

export function union(a: BitConstraint, b: BitConstraint): BitConstraint {
  return { mask: a.mask | b.mask };
}

/** Both constraints at once. */
export function intersection(a: BitConstraint, b: BitConstraint): BitConstraint {
  return { mask: a.mask & b.mask };
}

/** Whether `value` satisfies the constraint. */
export function allows(constraint: BitConstraint, value: FieldElement): boolean {
  return (value.toBigInt() & ~constraint.mask) === 0n;
}

export function formatBitConstraint(constraint: BitConstraint): string {
  return `0x${constraint.mask.toString(16)}`;
}

/** Read access to known bit constraints, keyed by witness column id. */
export interface BitConstraintSet {
  bitConstraint(id: number): BitConstraint | undefined;
}

export class SimpleBitConstraintSet implements BitConstraintSet {
  private readonly constraints = new Map<number, BitConstraint>();

  constructor(entries: Iterable<readonly [number, BitConstraint]> = []) {
    for (const [id, c] of entries) this.constraints.set(id, c);
  }

  bitConstraint(id: number): BitConstraint | undefined {
    return this.constraints.get(id);
  }

  set(id: number, constraint: BitConstraint): void {
    this.constraints.set(id, constraint);
  }

  get size(): number {
    return this.constraints.size;
  }

  entries(): IterableIterator<[number, BitConstraint]> {
    return this.constraints.entries();
  }
}

/** Constraints learned for one row, falling back to the global ones. */
export class OverlayBitConstraintSet implements BitConstraintSet {
  constructor(
    private readonly local: BitConstraintSet,
    private readonly base: BitConstraintSet
  ) {}

  bitConstraint(id: number): BitConstraint | undefined {
    return this.local.bitConstraint(id) ?? this.base.bitConstraint(id);
  }
}
