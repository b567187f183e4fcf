/**
 * Symbolic evaluation of analyzed expressions into affine expressions.
 */
import {
  FieldElement,
  assertNever,
  foldBinary,
  formatExpression,
  type Analyzed,
  type BinaryOperator,
  type Expression,
  type MatchArm,
  type PolynomialReference,
  type PublicDeclaration,
} from "@pilkit/core";
import { AffineExpression } from "./affine-expression.js";
import type { IncompleteCause } from "./eval-result.js";

export type AffineResult =
  | { readonly ok: true; readonly value: AffineExpression }
  | { readonly ok: false; readonly cause: IncompleteCause };

export function affine(value: AffineExpression): AffineResult {
  return { ok: true, value };
}

export function unresolved(cause: IncompleteCause): AffineResult {
  return { ok: false, cause };
}

/** Supplies values (known or symbolic) for references to polynomials and publics. */
export interface SymbolicVariables {
  value(reference: PolynomialReference): AffineResult;
  publicValue(declaration: PublicDeclaration): AffineResult;
}

export class ExpressionEvaluator {
  constructor(
    private readonly analyzed: Analyzed,
    private readonly variables: SymbolicVariables,
    private readonly locals: readonly FieldElement[] = []
  ) {}

  evaluate(expr: Expression): AffineResult {
    switch (expr.kind) {
      case "Constant": {
        const value = this.analyzed.constants.get(expr.name);
        return value !== undefined
          ? affine(AffineExpression.constant(value))
          : unimplemented(`unknown constant ${expr.name}`);
      }
      case "PolynomialReference":
        return this.variables.value(expr.reference);
      case "LocalVariableReference": {
        const value = this.locals[expr.index];
        return value !== undefined
          ? affine(AffineExpression.constant(value))
          : unimplemented(`unbound local variable $${expr.index}`);
      }
      case "PublicReference": {
        const declaration = this.analyzed.publicDeclarations.get(expr.name);
        return declaration
          ? this.variables.publicValue(declaration)
          : unimplemented(`unknown public ${expr.name}`);
      }
      case "Number":
        return affine(AffineExpression.constant(expr.value));
      case "BinaryOperation":
        return this.evaluateBinary(expr.left, expr.op, expr.right);
      case "UnaryOperation": {
        const operand = this.evaluate(expr.operand);
        if (!operand.ok || expr.op === "+") return operand;
        return affine(operand.value.neg());
      }
      case "MatchExpression":
        return this.evaluateMatch(expr.scrutinee, expr.arms);
      case "String":
      case "Tuple":
      case "FunctionCall":
        return unimplemented(formatExpression(expr));
      default:
        return assertNever(expr, "expression");
    }
  }

  private evaluateBinary(leftExpr: Expression, op: BinaryOperator, rightExpr: Expression): AffineResult {
    const left = this.evaluate(leftExpr);
    if (!left.ok) return left;
    const right = this.evaluate(rightExpr);
    if (!right.ok) return right;
    const l = left.value;
    const r = right.value;
    const lc = l.constantValue();
    const rc = r.constantValue();

    switch (op) {
      case "+":
        return affine(l.add(r));
      case "-":
        return affine(l.sub(r));
      case "*":
        if (lc !== undefined) return affine(r.mulScalar(lc));
        if (rc !== undefined) return affine(l.mulScalar(rc));
        return unresolved({ kind: "QuadraticTerm" });
      case "/":
        if (rc === undefined || rc.isZero()) return unresolved({ kind: "DivisionTerm" });
        return affine(l.mulScalar(rc.inverse()));
      case "**":
        if (lc === undefined || rc === undefined) return unresolved({ kind: "ExponentiationTerm" });
        return affine(AffineExpression.constant(lc.pow(rc.toBigInt())));
      default:
        if (lc === undefined || rc === undefined) {
          return unimplemented(`operator ${op} on non-constant operands`);
        }
        return foldConstant(lc, op, rc);
    }
  }

  private evaluateMatch(
    scrutineeExpr: Expression,
    arms: readonly MatchArm[]
  ): AffineResult {
    const scrutinee = this.evaluate(scrutineeExpr);
    if (!scrutinee.ok) return scrutinee;
    const value = scrutinee.value.constantValue();
    if (value === undefined) return unresolved({ kind: "NonConstantQueryMatchScrutinee" });
    const arm = arms.find((a) => a.pattern === undefined || a.pattern.equals(value));
    if (!arm) return unresolved({ kind: "NoMatchArmFound" });
    return this.evaluate(arm.value);
  }
}

function unimplemented(detail: string): AffineResult {
  return unresolved({ kind: "ExpressionEvaluationUnimplemented", detail });
}

function foldConstant(l: FieldElement, op: BinaryOperator, r: FieldElement): AffineResult {
  try {
    return affine(AffineExpression.constant(foldBinary(l, op, r)));
  } catch (e) {
    return unimplemented(e instanceof Error ? e.message : String(e));
  }
}
