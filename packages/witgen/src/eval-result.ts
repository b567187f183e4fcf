/**
 * Outcomes of evaluating an expression, identity or lookup while deducing
 * witness values.
 *
 * An evaluation either succeeds with an {@link EvalValue} (which may still be
 * incomplete, meaning "retry once more is known") or fails with an
 * {@link EvalError} for the current attempt.
 */
import type { FieldElement } from "@pilkit/core";
import { assertNever } from "@pilkit/core";
import { formatBitConstraint, type BitConstraint } from "./bit-constraints.js";

/** Reasons an evaluation could not fully resolve. */
export type IncompleteCause =
  /** A current-row value needed to derive the next row is unknown, e.g. `x' = x` with `x` unknown. */
  | { readonly kind: "PreviousValueUnknown"; readonly column: string }
  /** Parts of an equation carry no bit constraint. Holds the column ids of those parts. */
  | { readonly kind: "BitUnconstrained"; readonly indices: readonly number[] }
  | { readonly kind: "OverlappingBitConstraints" }
  | { readonly kind: "MultipleLookupMatches" }
  /** An affine equation with more than one unknown, e.g. `x + y = 0`. */
  | { readonly kind: "MultipleLinearSolutions" }
  | { readonly kind: "NoProgressTransferring" }
  | { readonly kind: "QuadraticTerm" }
  | { readonly kind: "DivisionTerm" }
  | { readonly kind: "ExponentiationTerm" }
  | { readonly kind: "NoQueryAnswer"; readonly query: string; readonly column: string }
  | { readonly kind: "NonConstantQueryMatchScrutinee" }
  | { readonly kind: "NonConstantLeftSelector" }
  | { readonly kind: "NonConstantWriteValue" }
  | { readonly kind: "ExpressionEvaluationUnimplemented"; readonly detail: string }
  /** Concrete scrutinee matched by no arm and no default arm. */
  | { readonly kind: "NoMatchArmFound" }
  | { readonly kind: "SolvingFailed" }
  /** Something was learned (e.g. a bit constraint) but no value was pinned. */
  | { readonly kind: "NotConcrete" }
  | { readonly kind: "Multiple"; readonly causes: readonly IncompleteCause[] };

export type IncompleteCauseKind = IncompleteCause["kind"];

/** The non-`Multiple` causes contained in `cause`, in encounter order. */
export function flattenCause(cause: IncompleteCause): IncompleteCause[] {
  return cause.kind === "Multiple" ? cause.causes.flatMap(flattenCause) : [cause];
}

/** Merges two causes into a single flat `Multiple`, keeping every cause. */
export function combineCauses(left: IncompleteCause, right: IncompleteCause): IncompleteCause {
  return { kind: "Multiple", causes: [...flattenCause(left), ...flattenCause(right)] };
}

const TERMINAL_CAUSES: ReadonlySet<IncompleteCauseKind> = new Set<IncompleteCauseKind>([
  "QuadraticTerm",
  "DivisionTerm",
  "ExponentiationTerm",
  "NoMatchArmFound",
  "ExpressionEvaluationUnimplemented",
]);

/** True when retrying after more values are known cannot resolve the cause. */
export function isTerminalCause(cause: IncompleteCause): boolean {
  return flattenCause(cause).some((c) => TERMINAL_CAUSES.has(c.kind));
}

/** Renders a cause; `nameOf` turns column ids into names. */
export function formatIncompleteCause(cause: IncompleteCause, nameOf: (id: number) => string = String): string {
  switch (cause.kind) {
    case "PreviousValueUnknown":
      return `Previous value of column ${cause.column} is not yet known`;
    case "BitUnconstrained":
      return `Columns [${cause.indices.map(nameOf).join(", ")}] are not bit-constrained`;
    case "OverlappingBitConstraints":
      return "Bit constraints are overlapping";
    case "MultipleLookupMatches":
      return "Multiple rows match the lookup";
    case "MultipleLinearSolutions":
      return "Linear constraint has more than one solution";
    case "NoProgressTransferring":
      return "No progress was made";
    case "QuadraticTerm":
      return "Expression is not affine: quadratic term";
    case "DivisionTerm":
      return "Expression is not affine: division term";
    case "ExponentiationTerm":
      return "Expression is not affine: exponentiation term";
    case "NoQueryAnswer":
      return `No answer to query ${cause.query} for column ${cause.column}`;
    case "NonConstantQueryMatchScrutinee":
      return "Match scrutinee is not constant";
    case "NonConstantLeftSelector":
      return "Left selector of the lookup is not constant";
    case "NonConstantWriteValue":
      return "Value to be written is not constant";
    case "ExpressionEvaluationUnimplemented":
      return `Cannot evaluate expression: ${cause.detail}`;
    case "NoMatchArmFound":
      return "No match arm matches the scrutinee";
    case "SolvingFailed":
      return "All solving strategies failed";
    case "NotConcrete":
      return "Knowledge was gained but no concrete value";
    case "Multiple":
      return flattenCause(cause).map((c) => formatIncompleteCause(c, nameOf)).join("\n");
    default:
      return assertNever(cause, "incomplete cause");
  }
}

// --- Constraints ---

export type Constraint =
  | { readonly kind: "Assignment"; readonly value: FieldElement }
  /** Narrows the possible bits of a value without pinning it. */
  | { readonly kind: "BitConstraint"; readonly constraint: BitConstraint };

/** A constraint on the witness column with the given id. */
export type ColumnConstraint = readonly [columnId: number, constraint: Constraint];

export function formatConstraint(constraint: Constraint): string {
  switch (constraint.kind) {
    case "Assignment":
      return ` = ${constraint.value.toString()}`;
    case "BitConstraint":
      return `:& ${formatBitConstraint(constraint.constraint)}`;
    default:
      return assertNever(constraint, "constraint");
  }
}

// --- Status ---

export type EvalStatus =
  | { readonly kind: "Complete" }
  | { readonly kind: "Incomplete"; readonly cause: IncompleteCause };

export const COMPLETE: EvalStatus = { kind: "Complete" };

export function incompleteStatus(cause: IncompleteCause): EvalStatus {
  return { kind: "Incomplete", cause };
}

export function combineStatus(left: EvalStatus, right: EvalStatus): EvalStatus {
  if (left.kind === "Complete") return right;
  if (right.kind === "Complete") return left;
  return incompleteStatus(combineCauses(left.cause, right.cause));
}

/**
 * Constraints learned by one evaluation together with its status.
 * Learned constraints are kept even when the status is incomplete.
 */
export class EvalValue {
  constraints: ColumnConstraint[];
  status: EvalStatus;

  constructor(constraints: Iterable<ColumnConstraint>, status: EvalStatus) {
    this.constraints = [...constraints];
    this.status = status;
  }

  static complete(constraints: Iterable<ColumnConstraint> = []): EvalValue {
    return new EvalValue(constraints, COMPLETE);
  }

  static incomplete(cause: IncompleteCause): EvalValue {
    return new EvalValue([], incompleteStatus(cause));
  }

  static incompleteWithConstraints(constraints: Iterable<ColumnConstraint>, cause: IncompleteCause): EvalValue {
    return new EvalValue(constraints, incompleteStatus(cause));
  }

  isComplete(): boolean {
    return this.status.kind === "Complete";
  }

  isEmpty(): boolean {
    return this.constraints.length === 0;
  }

  /** Appends `other`'s constraints and merges its status into this value. */
  combine(other: EvalValue): void {
    this.constraints.push(...other.constraints);
    this.status = combineStatus(this.status, other.status);
  }
}

// --- Errors ---

export type EvalError =
  /** The table ran out of rows. */
  | { readonly kind: "RowsExhausted" }
  /** A constraint that cannot hold, such as `2 = 1`. */
  | { readonly kind: "ConstraintUnsatisfiable"; readonly detail: string }
  /** e.g. `X = 0x100` where `X` is known to fit in `0xff`. */
  | { readonly kind: "ConflictingBitConstraints" }
  | { readonly kind: "FixedLookupFailed" }
  | { readonly kind: "Generic"; readonly message: string }
  | { readonly kind: "Multiple"; readonly errors: readonly EvalError[] };

export function flattenError(error: EvalError): EvalError[] {
  return error.kind === "Multiple" ? error.errors.flatMap(flattenError) : [error];
}

/** Merges two errors into a single flat `Multiple`, keeping every error. */
export function combineErrors(left: EvalError, right: EvalError): EvalError {
  return { kind: "Multiple", errors: [...flattenError(left), ...flattenError(right)] };
}

export function genericError(message: string): EvalError {
  return { kind: "Generic", message };
}

/** Errors after which the whole solve cannot succeed. */
export function isFatalEvalError(error: EvalError): boolean {
  return flattenError(error).some(
    (e) => e.kind === "RowsExhausted" || e.kind === "ConstraintUnsatisfiable" || e.kind === "ConflictingBitConstraints"
  );
}

export function formatEvalError(error: EvalError): string {
  switch (error.kind) {
    case "RowsExhausted":
      return "Table rows exhausted";
    case "ConstraintUnsatisfiable":
      return `Linear constraint is not satisfiable: ${error.detail}`;
    case "ConflictingBitConstraints":
      return "Bit constraints in the expression are conflicting or do not match the constant / offset.";
    case "FixedLookupFailed":
      return "Lookup into fixed columns failed: no match";
    case "Generic":
      return error.message;
    case "Multiple":
      return flattenError(error).map(formatEvalError).join("\n");
    default:
      return assertNever(error, "evaluation error");
  }
}

// --- Results ---

export type EvalResult =
  | { readonly ok: true; readonly value: EvalValue }
  | { readonly ok: false; readonly error: EvalError };

export function evalOk(value: EvalValue): EvalResult {
  return { ok: true, value };
}

export function evalFail(error: EvalError): EvalResult {
  return { ok: false, error };
}
