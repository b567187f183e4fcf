/**
 * Bit constraints that hold on every row, read off fixed column contents and
 * from identities of the form `{ x } in { F }` and `x * (1 - x) = 0`.
 */
import type { Expression, Identity } from "@pilkit/core";
import { columnName } from "./constant-evaluator.js";
import { fromMask, fromMaxBitCount, intersection, SimpleBitConstraintSet, type BitConstraint } from "./bit-constraints.js";
import type { FixedData } from "./fixed-data.js";

export interface GlobalConstraints {
  /** Per fixed column, by name. */
  readonly fixedConstraints: ReadonlyMap<string, BitConstraint>;
  /** Per witness column, by id. */
  readonly witnessConstraints: SimpleBitConstraintSet;
  /** Identities fully captured by the witness constraints. */
  readonly retained: readonly Identity[];
}

const MAX_MASK_BITS = 63;

export function determineGlobalConstraints(fixed: FixedData): GlobalConstraints {
  const fixedConstraints = new Map<string, BitConstraint>();
  for (const [name, values] of fixed.fixedColumns) {
    let mask = 0n;
    for (const v of values) mask |= v.toBigInt();
    if (values.length > 0 && mask.toString(2).length <= MAX_MASK_BITS) {
      fixedConstraints.set(name, fromMask(mask));
    }
  }

  const witnessConstraints = new SimpleBitConstraintSet();
  const retained: Identity[] = [];
  for (const identity of fixed.analyzed.identities) {
    const found = identity.kind === "Plookup"
      ? lookupConstraint(fixed, identity, fixedConstraints)
      : identity.kind === "Polynomial"
        ? booleanConstraint(fixed, identity)
        : undefined;
    if (found) {
      const [id, constraint] = found;
      const existing = witnessConstraints.bitConstraint(id);
      witnessConstraints.set(id, existing ? intersection(existing, constraint) : constraint);
      retained.push(identity);
    }
  }
  return { fixedConstraints, witnessConstraints, retained };
}

function plainWitness(fixed: FixedData, expr: Expression | undefined): number | undefined {
  if (expr?.kind !== "PolynomialReference" || expr.reference.next) return undefined;
  return fixed.witnessId(expr.reference);
}

/** `{ x } in { F }` with no selectors. */
function lookupConstraint(
  fixed: FixedData,
  identity: Identity,
  fixedConstraints: ReadonlyMap<string, BitConstraint>
): readonly [number, BitConstraint] | undefined {
  const { left, right } = identity;
  if (left.selector || right.selector || left.expressions.length !== 1 || right.expressions.length !== 1) {
    return undefined;
  }
  const id = plainWitness(fixed, left.expressions[0]);
  const target = right.expressions[0];
  if (id === undefined || target?.kind !== "PolynomialReference" || target.reference.next) return undefined;
  const constraint = fixedConstraints.get(columnName(target.reference.name, target.reference.index));
  return constraint && [id, constraint];
}

/** `x * (1 - x) = 0` or `(x - 1) * x = 0`, in either operand order. */
function booleanConstraint(fixed: FixedData, identity: Identity): readonly [number, BitConstraint] | undefined {
  let expr = identity.left.selector;
  // `a = 0` is stored as `a - 0`.
  if (expr?.kind === "BinaryOperation" && expr.op === "-" && isZero(expr.right)) expr = expr.left;
  if (expr?.kind !== "BinaryOperation" || expr.op !== "*") return undefined;
  for (const [a, b] of [[expr.left, expr.right], [expr.right, expr.left]] as const) {
    const id = plainWitness(fixed, a);
    if (id === undefined || b.kind !== "BinaryOperation" || b.op !== "-") continue;
    const oneMinusX = isOne(b.left) && plainWitness(fixed, b.right) === id;
    const xMinusOne = isOne(b.right) && plainWitness(fixed, b.left) === id;
    if (oneMinusX || xMinusOne) return [id, fromMaxBitCount(1)];
  }
  return undefined;
}

function isOne(expr: Expression): boolean {
  return expr.kind === "Number" && expr.value.toBigInt() === 1n;
}

function isZero(expr: Expression): boolean {
  return expr.kind === "Number" && expr.value.isZero();
}
