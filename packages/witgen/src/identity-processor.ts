/**
 * Derives constraints on the row being solved from a single identity.
 */
import {
  assertNever,
  type Expression,
  type FieldElement,
  type Identity,
} from "@pilkit/core";
import { AffineExpression, type NameOf } from "./affine-expression.js";
import type { BitConstraintSet } from "./bit-constraints.js";
import {
  EvalValue,
  combineCauses,
  evalFail,
  evalOk,
  type EvalResult,
  type IncompleteCause,
} from "./eval-result.js";
import { ExpressionEvaluator, type SymbolicVariables } from "./expression-evaluator.js";
import { columnName } from "./constant-evaluator.js";
import type { FixedData } from "./fixed-data.js";
import type { FixedLookup } from "./fixed-lookup.js";

export class IdentityProcessor {
  private readonly nameOf: NameOf;

  constructor(
    private readonly fixed: FixedData,
    private readonly fixedLookup: FixedLookup
  ) {
    this.nameOf = (id) => fixed.witnessName(id);
  }

  process(identity: Identity, variables: SymbolicVariables, bitConstraints: BitConstraintSet): EvalResult {
    const evaluator = new ExpressionEvaluator(this.fixed.analyzed, variables);
    switch (identity.kind) {
      case "Polynomial":
        return this.processPolynomial(identity, evaluator, bitConstraints);
      case "Plookup":
        return this.processPlookup(identity, evaluator);
      // Checked by the proof system; nothing to derive row by row.
      case "Permutation":
      case "Connect":
        return evalOk(EvalValue.complete());
      default:
        return assertNever(identity.kind, "identity kind");
    }
  }

  private processPolynomial(identity: Identity, evaluator: ExpressionEvaluator, bitConstraints: BitConstraintSet): EvalResult {
    const expr = identity.left.selector;
    if (!expr) return evalOk(EvalValue.complete());
    const result = evaluator.evaluate(expr);
    if (!result.ok) return evalOk(EvalValue.incomplete(result.cause));
    return result.value.solveWithBitConstraints(bitConstraints, this.nameOf);
  }

  private processPlookup(identity: Identity, evaluator: ExpressionEvaluator): EvalResult {
    if (identity.left.selector) {
      const selector = evaluator.evaluate(identity.left.selector);
      if (!selector.ok) return evalOk(EvalValue.incomplete(selector.cause));
      const value = selector.value.constantValue();
      if (value === undefined) return evalOk(EvalValue.incomplete({ kind: "NonConstantLeftSelector" }));
      if (value.isZero()) return evalOk(EvalValue.complete());
    }

    const columns = this.fixedColumns(identity.right.expressions);
    if (!columns || identity.right.selector) {
      return evalOk(EvalValue.incomplete({
        kind: "ExpressionEvaluationUnimplemented",
        detail: "lookups are only supported into unselected fixed columns",
      }));
    }

    const left: AffineExpression[] = [];
    let cause: IncompleteCause | undefined;
    for (const expr of identity.left.expressions) {
      const result = evaluator.evaluate(expr);
      if (result.ok) left.push(result.value);
      else cause = cause ? combineCauses(cause, result.cause) : result.cause;
    }
    if (cause) return evalOk(EvalValue.incomplete(cause));

    const known: (FieldElement | undefined)[] = left.map((e) => e.constantValue());
    const outcome = this.fixedLookup.lookup(columns, known);
    switch (outcome.kind) {
      case "none":
        return evalFail({ kind: "FixedLookupFailed" });
      case "multiple":
        return known.every((v) => v !== undefined)
          ? evalOk(EvalValue.complete())
          : evalOk(EvalValue.incomplete({ kind: "MultipleLookupMatches" }));
      case "unique":
        return this.assignFromRow(left, columns, outcome.row);
      default:
        return assertNever(outcome, "lookup outcome");
    }
  }

  /** Solves each `left_i = column_i[row]`. */
  private assignFromRow(left: readonly AffineExpression[], columns: readonly string[], row: number): EvalResult {
    const value = EvalValue.complete();
    for (const [i, expr] of left.entries()) {
      const column = columns[i];
      const fixedValue = column === undefined ? undefined : this.fixedLookup.value(column, row);
      if (fixedValue === undefined) continue;
      const result = expr.sub(AffineExpression.constant(fixedValue)).solve(this.nameOf);
      if (!result.ok) return result;
      value.combine(result.value);
    }
    return evalOk(value);
  }

  /** Column names of plain references to fixed columns, if that is all there is. */
  private fixedColumns(expressions: readonly Expression[]): string[] | undefined {
    const names: string[] = [];
    for (const expr of expressions) {
      if (expr.kind !== "PolynomialReference" || expr.reference.next) return undefined;
      const poly = this.fixed.polynomial(expr.reference);
      if (poly?.polyType !== "Constant") return undefined;
      names.push(columnName(expr.reference.name, expr.reference.index));
    }
    return names;
  }
}
