/**
 * Affine expressions over witness cells: `c_1 * x_1 + ... + c_n * x_n + offset`,
 * and solving `expr = 0` for the unknowns.
 */
import { FieldElement, MODULUS } from "@pilkit/core";
import {
  fromMask,
  multiple,
  type BitConstraint,
  type BitConstraintSet,
} from "./bit-constraints.js";
import {
  EvalValue,
  evalFail,
  evalOk,
  type ColumnConstraint,
  type EvalResult,
} from "./eval-result.js";

export type NameOf = (id: number) => string;

const HALF_MODULUS = MODULUS / 2n;

/** Renders large field elements as negatives, e.g. `p - 1` as `-1`. */
export function formatSigned(value: FieldElement): string {
  const v = value.toBigInt();
  return v > HALF_MODULUS ? `-${MODULUS - v}` : v.toString();
}

export class AffineExpression {
  /** Non-zero coefficients only. */
  private readonly coefficients: ReadonlyMap<number, FieldElement>;
  readonly offset: FieldElement;

  private constructor(coefficients: Map<number, FieldElement>, offset: FieldElement) {
    for (const [id, c] of coefficients) {
      if (c.isZero()) coefficients.delete(id);
    }
    this.coefficients = coefficients;
    this.offset = offset;
  }

  static constant(value: FieldElement): AffineExpression {
    return new AffineExpression(new Map(), value);
  }

  static variable(id: number): AffineExpression {
    return new AffineExpression(new Map([[id, FieldElement.ONE]]), FieldElement.ZERO);
  }

  coefficient(id: number): FieldElement {
    return this.coefficients.get(id) ?? FieldElement.ZERO;
  }

  /** Ids with a non-zero coefficient, ascending. */
  nonzeroVariables(): number[] {
    return [...this.coefficients.keys()].sort((a, b) => a - b);
  }

  isConstant(): boolean {
    return this.coefficients.size === 0;
  }

  constantValue(): FieldElement | undefined {
    return this.isConstant() ? this.offset : undefined;
  }

  add(other: AffineExpression): AffineExpression {
    const coefficients = new Map(this.coefficients);
    for (const [id, c] of other.coefficients) {
      coefficients.set(id, (coefficients.get(id) ?? FieldElement.ZERO).add(c));
    }
    return new AffineExpression(coefficients, this.offset.add(other.offset));
  }

  sub(other: AffineExpression): AffineExpression {
    return this.add(other.neg());
  }

  neg(): AffineExpression {
    return this.mulScalar(FieldElement.ONE.neg());
  }

  mulScalar(factor: FieldElement): AffineExpression {
    const coefficients = new Map<number, FieldElement>();
    for (const [id, c] of this.coefficients) coefficients.set(id, c.mul(factor));
    return new AffineExpression(coefficients, this.offset.mul(factor));
  }

  /**
   * Solves `this = 0` when at most one unknown remains.
   */
  solve(nameOf?: NameOf): EvalResult {
    const vars = this.nonzeroVariables();
    const [id] = vars;
    if (id === undefined) {
      if (this.offset.isZero()) return evalOk(EvalValue.complete());
      return evalFail({ kind: "ConstraintUnsatisfiable", detail: `${this.toString(nameOf)} = 0` });
    }
    if (vars.length > 1) {
      return evalOk(EvalValue.incomplete({ kind: "MultipleLinearSolutions" }));
    }
    const value = this.offset.neg().div(this.coefficient(id));
    return evalOk(EvalValue.complete([[id, { kind: "Assignment", value }]]));
  }

  /**
   * Like {@link solve}, but also uses known bit constraints: either to pass a
   * constraint on to the single unconstrained variable, or to split the
   * offset into the bit-disjoint parts of several variables.
   */
  solveWithBitConstraints(known: BitConstraintSet, nameOf?: NameOf): EvalResult {
    const direct = this.solve(nameOf);
    if (!direct.ok || direct.value.isComplete()) return direct;

    const transferred = this.transferConstraints(known);
    if (transferred) {
      return evalOk(EvalValue.incompleteWithConstraints(
        [[transferred[0], { kind: "BitConstraint", constraint: transferred[1] }]],
        { kind: "NotConcrete" }
      ));
    }
    return this.solveThroughConstraints(known);
  }

  /**
   * For `X = a_1 * Y_1 + ... + a_n * Y_n` with all `Y_i` constrained and
   * bit-disjoint after scaling, derives the constraint on `X`.
   */
  private transferConstraints(known: BitConstraintSet): readonly [number, BitConstraint] | undefined {
    if (!this.offset.isZero()) return undefined;
    const vars = this.nonzeroVariables();
    const free = vars.filter((id) => known.bitConstraint(id) === undefined);
    const [target] = free;
    if (target === undefined || free.length !== 1) return undefined;

    const scale = this.coefficient(target).neg().inverse();
    let mask = 0n;
    for (const id of vars) {
      if (id === target) continue;
      const constraint = known.bitConstraint(id);
      if (!constraint) return undefined;
      const scaled = multiple(constraint, this.coefficient(id).mul(scale));
      if (!scaled || (scaled.mask & mask) !== 0n) return undefined;
      mask |= scaled.mask;
    }
    return [target, fromMask(mask)];
  }

  private solveThroughConstraints(known: BitConstraintSet): EvalResult {
    const parts: { id: number; coefficient: FieldElement; mask: bigint }[] = [];
    const unconstrained: number[] = [];
    for (const id of this.nonzeroVariables()) {
      const coefficient = this.coefficient(id);
      const constraint = known.bitConstraint(id);
      const scaled = constraint && multiple(constraint, coefficient);
      if (scaled) parts.push({ id, coefficient, mask: scaled.mask });
      else unconstrained.push(id);
    }
    if (unconstrained.length > 0) {
      return evalOk(EvalValue.incomplete({ kind: "BitUnconstrained", indices: unconstrained }));
    }

    let covered = 0n;
    for (const part of parts) {
      if ((covered & part.mask) !== 0n) {
        return evalOk(EvalValue.incomplete({ kind: "OverlappingBitConstraints" }));
      }
      covered |= part.mask;
    }

    const target = this.offset.neg().toBigInt();
    if ((target & ~covered) !== 0n) {
      return evalFail({ kind: "ConflictingBitConstraints" });
    }
    const assignments: ColumnConstraint[] = parts.map((part) => [
      part.id,
      { kind: "Assignment", value: FieldElement.from(target & part.mask).div(part.coefficient) },
    ]);
    return evalOk(EvalValue.complete(assignments));
  }

  toString(nameOf: NameOf = (id) => `#${id}`): string {
    const terms: string[] = [];
    for (const id of this.nonzeroVariables()) {
      const c = formatSigned(this.coefficient(id));
      const name = nameOf(id);
      terms.push(c === "1" ? name : c === "-1" ? `-${name}` : `${c} * ${name}`);
    }
    if (!this.offset.isZero() || terms.length === 0) {
      terms.push(formatSigned(this.offset));
    }
    return terms.join(" + ").replace(/ \+ -/g, " - ");
  }
}
