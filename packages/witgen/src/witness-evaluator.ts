/**
 * Resolves polynomial references to known values or symbolic witness cells
 * while a row is being solved.
 */
import {
  assertNever,
  type Analyzed,
  type Expression,
  type FieldElement,
  type Identity,
  type PolynomialReference,
  type PublicDeclaration,
} from "@pilkit/core";
import { AffineExpression } from "./affine-expression.js";
import { ExpressionEvaluator, affine, unresolved, type AffineResult, type SymbolicVariables } from "./expression-evaluator.js";
import type { FixedData } from "./fixed-data.js";

export type WitnessRows = readonly (readonly (FieldElement | undefined)[])[];

/**
 * `row` evaluates everything on the row being solved. `transition` treats
 * plain references as the previous row and `x'` as the row being solved.
 */
export type EvaluationMode = "row" | "transition";

export class WitnessColumnEvaluator implements SymbolicVariables {
  constructor(
    private readonly fixed: FixedData,
    private readonly rows: WitnessRows,
    private readonly row: number,
    private readonly mode: EvaluationMode,
    /** Set while expanding an intermediate referenced as `p'`. */
    private readonly shifted: boolean = false,
    /** Intermediates currently being expanded. */
    private readonly expanding: ReadonlySet<string> = new Set()
  ) {}

  value(reference: PolynomialReference): AffineResult {
    if (reference.next && this.shifted) {
      return unresolved({ kind: "ExpressionEvaluationUnimplemented", detail: `double shift of ${reference.name}` });
    }
    const next = reference.next || this.shifted;
    const poly = this.fixed.polynomial(reference);
    if (!poly) {
      return unresolved({ kind: "ExpressionEvaluationUnimplemented", detail: `unknown polynomial ${reference.name}` });
    }

    switch (poly.polyType) {
      case "Constant": {
        const value = this.fixed.fixedValue(reference, this.rowOf(next));
        return value !== undefined
          ? affine(AffineExpression.constant(value))
          : unresolved({ kind: "ExpressionEvaluationUnimplemented", detail: `no values for ${reference.name}` });
      }
      case "Intermediate": {
        const definition = this.fixed.analyzed.definitions.get(poly.absoluteName)?.[1];
        if (definition?.kind !== "Mapping") {
          return unresolved({ kind: "ExpressionEvaluationUnimplemented", detail: `undefined intermediate ${poly.absoluteName}` });
        }
        if (this.expanding.has(poly.absoluteName)) {
          return unresolved({ kind: "ExpressionEvaluationUnimplemented", detail: `cyclic intermediate ${poly.absoluteName}` });
        }
        const variables = new WitnessColumnEvaluator(
          this.fixed,
          this.rows,
          this.row,
          this.mode,
          next,
          new Set([...this.expanding, poly.absoluteName])
        );
        return new ExpressionEvaluator(this.fixed.analyzed, variables).evaluate(definition.expr);
      }
      case "Committed": {
        const id = poly.id + (reference.index ?? 0);
        if (this.mode === "transition" && !next) {
          const value = this.rows[this.rowOf(false)]?.[id];
          return value !== undefined
            ? affine(AffineExpression.constant(value))
            : unresolved({ kind: "PreviousValueUnknown", column: this.fixed.witnessName(id) });
        }
        return this.cell(id);
      }
      default:
        return assertNever(poly.polyType, "polynomial type");
    }
  }

  publicValue(declaration: PublicDeclaration): AffineResult {
    const id = this.fixed.witnessId(declaration.polynomial);
    if (id === undefined) {
      const value = this.fixed.fixedValue(declaration.polynomial, declaration.index);
      return value !== undefined
        ? affine(AffineExpression.constant(value))
        : unresolved({ kind: "ExpressionEvaluationUnimplemented", detail: `public ${declaration.name}` });
    }
    if (declaration.index === this.row) return this.cell(id);
    const value = this.rows[declaration.index]?.[id];
    return value !== undefined
      ? affine(AffineExpression.constant(value))
      : unresolved({ kind: "PreviousValueUnknown", column: declaration.name });
  }

  /** A cell of the row being solved: its value if known, else a variable. */
  private cell(id: number): AffineResult {
    const value = this.rows[this.row]?.[id];
    return affine(value !== undefined ? AffineExpression.constant(value) : AffineExpression.variable(id));
  }

  private rowOf(next: boolean): number {
    if (this.mode === "row" || next) return this.row;
    return (this.row - 1 + this.fixed.degree) % this.fixed.degree;
  }
}

/** Whether an expression refers to a next-row value, looking through intermediates. */
export function referencesNextRow(
  analyzed: Analyzed,
  expr: Expression,
  visiting: Set<string> = new Set()
): boolean {
  switch (expr.kind) {
    case "PolynomialReference": {
      if (expr.reference.next) return true;
      const definition = analyzed.definitions.get(expr.reference.name);
      if (!definition) return false;
      const [poly, value] = definition;
      if (poly.polyType !== "Intermediate" || value?.kind !== "Mapping" || visiting.has(poly.absoluteName)) {
        return false;
      }
      visiting.add(poly.absoluteName);
      return referencesNextRow(analyzed, value.expr, visiting);
    }
    case "BinaryOperation":
      return referencesNextRow(analyzed, expr.left, visiting) || referencesNextRow(analyzed, expr.right, visiting);
    case "UnaryOperation":
      return referencesNextRow(analyzed, expr.operand, visiting);
    case "Tuple":
      return expr.items.some((e) => referencesNextRow(analyzed, e, visiting));
    case "FunctionCall":
      return expr.args.some((e) => referencesNextRow(analyzed, e, visiting));
    case "MatchExpression":
      return referencesNextRow(analyzed, expr.scrutinee, visiting)
        || expr.arms.some((arm) => referencesNextRow(analyzed, arm.value, visiting));
    case "Constant":
    case "LocalVariableReference":
    case "PublicReference":
    case "Number":
    case "String":
      return false;
    default:
      return assertNever(expr, "expression");
  }
}

export function identityReferencesNextRow(analyzed: Analyzed, identity: Identity): boolean {
  const sides = [identity.left, identity.right];
  return sides.some((side) =>
    (side.selector !== undefined && referencesNextRow(analyzed, side.selector))
    || side.expressions.some((e) => referencesNextRow(analyzed, e))
  );
}
