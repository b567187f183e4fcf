/**
 * Asks an external callback for the values of query columns.
 */
import {
  FieldElement,
  formatExpression,
  type Expression,
} from "@pilkit/core";
import { ExpressionEvaluator, type SymbolicVariables } from "./expression-evaluator.js";
import { EvalValue, type IncompleteCause } from "./eval-result.js";
import type { FixedData, WitnessColumn } from "./fixed-data.js";

/** Answers a rendered query such as `("input", 3)`, or returns undefined. */
export type QueryCallback = (query: string) => FieldElement | undefined;

type Interpolation =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly cause: IncompleteCause };

export class QueryProcessor {
  constructor(
    private readonly fixed: FixedData,
    private readonly callback: QueryCallback
  ) {}

  /** Processes the query of `column` for `row`. */
  processQuery(column: WitnessColumn, row: number, variables: SymbolicVariables): EvalValue {
    if (!column.query) return EvalValue.complete();
    const evaluator = new ExpressionEvaluator(this.fixed.analyzed, variables, [FieldElement.from(row)]);
    const query = this.interpolate(column.query, evaluator);
    if (!query.ok) return EvalValue.incomplete(query.cause);
    const value = this.callback(query.text);
    if (value === undefined) {
      return EvalValue.incomplete({ kind: "NoQueryAnswer", query: query.text, column: column.name });
    }
    return EvalValue.complete([[column.id, { kind: "Assignment", value }]]);
  }

  /** Renders a query expression into the string passed to the callback. */
  interpolate(expr: Expression, evaluator: ExpressionEvaluator): Interpolation {
    switch (expr.kind) {
      case "String":
        return { ok: true, text: JSON.stringify(expr.value) };
      case "Tuple": {
        const parts: string[] = [];
        for (const item of expr.items) {
          const part = this.interpolate(item, evaluator);
          if (!part.ok) return part;
          parts.push(part.text);
        }
        return { ok: true, text: `(${parts.join(", ")})` };
      }
      case "MatchExpression": {
        const scrutinee = evaluator.evaluate(expr.scrutinee);
        if (!scrutinee.ok) return scrutinee;
        const value = scrutinee.value.constantValue();
        if (value === undefined) return { ok: false, cause: { kind: "NonConstantQueryMatchScrutinee" } };
        const arm = expr.arms.find((a) => a.pattern === undefined || a.pattern.equals(value));
        if (!arm) return { ok: false, cause: { kind: "NoMatchArmFound" } };
        return this.interpolate(arm.value, evaluator);
      }
      default: {
        const result = evaluator.evaluate(expr);
        if (!result.ok) return result;
        const value = result.value.constantValue();
        if (value === undefined) {
          return {
            ok: false,
            cause: { kind: "ExpressionEvaluationUnimplemented", detail: `query argument ${formatExpression(expr)} is not constant` },
          };
        }
        return { ok: true, text: value.toString() };
      }
    }
  }
}
