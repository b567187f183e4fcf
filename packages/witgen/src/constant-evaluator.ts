/**
 * Computes the values of fixed (constant) columns.
 */
import {
  FieldElement,
  assertNever,
  foldBinary,
  type Analyzed,
  type Definition,
  type Expression,
  type FunctionValueDefinition,
  type RepeatedArray,
} from "@pilkit/core";
import { WitgenError } from "./errors.js";

/** Column values keyed by column name; array elements are named `name[i]`. */
export type ColumnMap = Map<string, FieldElement[]>;

export function columnName(name: string, index?: number): string {
  return index === undefined ? name : `${name}[${index}]`;
}

/** The common row count of all polynomials, or 0 for an empty program. */
export function programDegree(analyzed: Analyzed): number {
  let degree: number | undefined;
  for (const [poly] of analyzed.definitions.values()) {
    if (degree === undefined) {
      degree = poly.degree;
    } else if (poly.degree !== degree) {
      throw new WitgenError(
        "E_DEGREE",
        `Polynomial ${poly.absoluteName} has degree ${poly.degree}, expected ${degree}.`,
        undefined,
        poly.source
      );
    }
  }
  return degree ?? 0;
}

/** Evaluates every constant polynomial on all rows, in source order. */
export function generateFixedColumns(analyzed: Analyzed): ColumnMap {
  const degree = programDegree(analyzed);
  const evaluator = new ConstantEvaluator(analyzed, degree);
  const columns: ColumnMap = new Map();
  for (const definition of analyzed.constantPolysInSourceOrder()) {
    const [poly] = definition;
    const values = evaluator.column(definition);
    if (poly.length === undefined) {
      columns.set(poly.absoluteName, values);
    } else {
      // Uninitialized constant arrays are all zero.
      for (let i = 0; i < poly.length; i++) {
        columns.set(columnName(poly.absoluteName, i), values.slice());
      }
    }
  }
  return columns;
}

/** Calls between constant definitions nest at most this deep. */
export const MAX_CALL_DEPTH = 500;

class ConstantEvaluator {
  private readonly arrays = new Map<string, FieldElement[]>();
  private depth = 0;

  constructor(
    private readonly analyzed: Analyzed,
    private readonly degree: number
  ) {}

  column([poly, value]: Definition): FieldElement[] {
    if (!value) {
      return new Array<FieldElement>(this.degree).fill(FieldElement.ZERO);
    }
    switch (value.kind) {
      case "Mapping": {
        const values: FieldElement[] = [];
        for (let row = 0; row < this.degree; row++) {
          values.push(this.evaluate(value.expr, [FieldElement.from(row)], poly.absoluteName));
        }
        return values;
      }
      case "Array":
        return this.arrayValues(poly.absoluteName, value.segments);
      case "Query":
        throw new WitgenError("E_FIXED", `Constant polynomial ${poly.absoluteName} cannot be defined by a query.`);
      default:
        return assertNever(value, "function value");
    }
  }

  private arrayValues(name: string, segments: readonly RepeatedArray[]): FieldElement[] {
    const cached = this.arrays.get(name);
    if (cached) return cached;
    const values: FieldElement[] = [];
    for (const segment of segments) {
      const items = segment.values.map((v) => this.evaluate(v, [], name));
      for (let r = 0; r < segment.repetitions; r++) values.push(...items);
    }
    if (values.length !== this.degree) {
      throw new WitgenError("E_FIXED", `Array ${name} has ${values.length} values, expected ${this.degree}.`);
    }
    this.arrays.set(name, values);
    return values;
  }

  private evaluate(expr: Expression, locals: readonly FieldElement[], column: string): FieldElement {
    switch (expr.kind) {
      case "Number":
        return expr.value;
      case "Constant": {
        const value = this.analyzed.constants.get(expr.name);
        if (value === undefined) throw this.fail(column, `unknown constant ${expr.name}`);
        return value;
      }
      case "LocalVariableReference": {
        const value = locals[expr.index];
        if (value === undefined) throw this.fail(column, `unbound local variable $${expr.index}`);
        return value;
      }
      case "BinaryOperation": {
        const l = this.evaluate(expr.left, locals, column);
        const r = this.evaluate(expr.right, locals, column);
        try {
          return foldBinary(l, expr.op, r);
        } catch (e) {
          throw this.fail(column, e instanceof Error ? e.message : String(e));
        }
      }
      case "UnaryOperation": {
        const v = this.evaluate(expr.operand, locals, column);
        return expr.op === "-" ? v.neg() : v;
      }
      case "MatchExpression": {
        const scrutinee = this.evaluate(expr.scrutinee, locals, column);
        const arm = expr.arms.find((a) => a.pattern === undefined || a.pattern.equals(scrutinee));
        if (!arm) throw this.fail(column, `no match arm for ${scrutinee.toString()}`);
        return this.evaluate(arm.value, locals, column);
      }
      case "FunctionCall":
        return this.call(expr.name, expr.args.map((a) => this.evaluate(a, locals, column)), column);
      case "PolynomialReference":
      case "PublicReference":
      case "String":
      case "Tuple":
        throw this.fail(column, `${expr.kind} is not allowed in a constant definition`);
      default:
        return assertNever(expr, "expression");
    }
  }

  private call(name: string, args: FieldElement[], column: string): FieldElement {
    const definition = this.analyzed.definitions.get(name);
    const value = definition?.[1];
    const [arg] = args;
    if (!value || arg === undefined) throw this.fail(column, `cannot call ${name}`);
    if (this.depth >= MAX_CALL_DEPTH) {
      throw this.fail(column, `calls to ${name} nest deeper than ${MAX_CALL_DEPTH}`);
    }
    this.depth++;
    try {
      return this.callValue(name, value, args, arg, column);
    } finally {
      this.depth--;
    }
  }

  private callValue(
    name: string,
    value: FunctionValueDefinition,
    args: FieldElement[],
    arg: FieldElement,
    column: string
  ): FieldElement {
    switch (value.kind) {
      case "Mapping":
        return this.evaluate(value.expr, args, name);
      case "Array": {
        const values = this.arrayValues(name, value.segments);
        const v = values[Number(arg.toBigInt() % BigInt(values.length || 1))];
        if (v === undefined) throw this.fail(column, `${name} has no values`);
        return v;
      }
      case "Query":
        throw this.fail(column, `cannot call query ${name}`);
      default:
        return assertNever(value, "function value");
    }
  }

  private fail(column: string, message: string): WitgenError {
    return new WitgenError("E_FIXED", `Cannot compute ${column}: ${message}.`);
  }
}
