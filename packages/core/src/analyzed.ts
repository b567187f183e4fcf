/**
 * Analyzed PIL program: the intermediate representation a parsed source is
 * lowered into. Built once by the analyzer and read-only afterwards.
 */
import type { DegreeType, FieldElement } from "./number.js";

export interface SourceRef {
  file: string;
  line: number;
}

export type PolynomialType = "Committed" | "Constant" | "Intermediate";

export interface Polynomial {
  readonly id: number;
  readonly source: SourceRef;
  readonly absoluteName: string;
  readonly polyType: PolynomialType;
  readonly degree: DegreeType;
  /** Present for arrays of polynomials. */
  readonly length?: DegreeType;
}

export function isArray(poly: Polynomial): boolean {
  return poly.length !== undefined;
}

export interface PolynomialReference {
  readonly name: string;
  /** Array element, when the polynomial is an array. */
  readonly index?: number;
  readonly next: boolean;
}

export interface PublicDeclaration {
  readonly id: number;
  readonly source: SourceRef;
  readonly name: string;
  readonly polynomial: PolynomialReference;
  /** The evaluation point of the polynomial, not the array index. */
  readonly index: DegreeType;
}

// --- Expressions ---

export type BinaryOperator = "+" | "-" | "*" | "/" | "%" | "**" | "&" | "|" | "^" | "<<" | ">>";

export type UnaryOperator = "+" | "-";

export interface MatchArm {
  /** Absent for the default arm. */
  readonly pattern?: FieldElement;
  readonly value: Expression;
}

export type Expression =
  | { readonly kind: "Constant"; readonly name: string }
  | { readonly kind: "PolynomialReference"; readonly reference: PolynomialReference }
  | { readonly kind: "LocalVariableReference"; readonly index: number }
  | { readonly kind: "PublicReference"; readonly name: string }
  | { readonly kind: "Number"; readonly value: FieldElement }
  | { readonly kind: "String"; readonly value: string }
  | { readonly kind: "Tuple"; readonly items: readonly Expression[] }
  | {
      readonly kind: "BinaryOperation";
      readonly left: Expression;
      readonly op: BinaryOperator;
      readonly right: Expression;
    }
  | { readonly kind: "UnaryOperation"; readonly op: UnaryOperator; readonly operand: Expression }
  /** Call to a non-macro function, such as a constant polynomial. */
  | { readonly kind: "FunctionCall"; readonly name: string; readonly args: readonly Expression[] }
  | { readonly kind: "MatchExpression"; readonly scrutinee: Expression; readonly arms: readonly MatchArm[] };

export type ExpressionKind = Expression["kind"];

/** Fails loudly on a variant a consumer does not handle. */
export function assertNever(value: never, what: string = "value"): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}

// --- Identities ---

export type IdentityKind = "Polynomial" | "Plookup" | "Permutation" | "Connect";

export interface SelectedExpressions {
  /** No selector means the side is always active. */
  readonly selector?: Expression;
  readonly expressions: readonly Expression[];
}

export interface Identity {
  /** The id is specific to the kind. */
  readonly id: number;
  readonly kind: IdentityKind;
  readonly source: SourceRef;
  /** For a polynomial identity, the selector holds the whole expression. */
  readonly left: SelectedExpressions;
  readonly right: SelectedExpressions;
}

// --- Function values ---

/**
 * A list of values replayed `repetitions` times.
 */
export class RepeatedArray {
  readonly values: readonly Expression[];
  readonly repetitions: DegreeType;

  constructor(values: readonly Expression[], repetitions: DegreeType) {
    if (!Number.isInteger(repetitions) || repetitions < 0) {
      throw new Error(`Invalid repetition count ${repetitions}.`);
    }
    if (repetitions === 0 && values.length > 0) {
      throw new Error("A non-empty array must be repeated at least once.");
    }
    if (values.length === 0 && repetitions > 1) {
      throw new Error("An empty array cannot be repeated more than once.");
    }
    this.values = Object.freeze([...values]);
    this.repetitions = repetitions;
  }

  /** Number of elements including repetitions. */
  size(): DegreeType {
    return this.values.length * this.repetitions;
  }
}

export type FunctionValueDefinition =
  | { readonly kind: "Mapping"; readonly expr: Expression }
  | { readonly kind: "Array"; readonly segments: readonly RepeatedArray[] }
  | { readonly kind: "Query"; readonly expr: Expression };

export type Definition = readonly [Polynomial, FunctionValueDefinition | undefined];

export type StatementIdentifier =
  | { readonly kind: "Definition"; readonly name: string }
  | { readonly kind: "PublicDeclaration"; readonly name: string }
  | { readonly kind: "Identity"; readonly index: number };

export interface AnalyzedParts {
  constants: Map<string, FieldElement>;
  definitions: Map<string, Definition>;
  publicDeclarations: Map<string, PublicDeclaration>;
  identities: Identity[];
  sourceOrder: StatementIdentifier[];
}

/**
 * The lowered program. `sourceOrder` is the only ordering to rely on; the
 * maps carry none.
 */
export class Analyzed {
  /** Constants are not namespaced. */
  readonly constants: ReadonlyMap<string, FieldElement>;
  readonly definitions: ReadonlyMap<string, Definition>;
  readonly publicDeclarations: ReadonlyMap<string, PublicDeclaration>;
  readonly identities: readonly Identity[];
  readonly sourceOrder: readonly StatementIdentifier[];

  constructor(parts: AnalyzedParts) {
    for (const statement of parts.sourceOrder) {
      if (statement.kind === "Definition" && !parts.definitions.has(statement.name)) {
        throw new Error(`Source order names unknown definition '${statement.name}'.`);
      }
    }
    this.constants = new Map(parts.constants);
    this.definitions = new Map(parts.definitions);
    this.publicDeclarations = new Map(parts.publicDeclarations);
    this.identities = Object.freeze([...parts.identities]);
    this.sourceOrder = Object.freeze([...parts.sourceOrder]);
  }

  /** Number of committed polynomials, counting array elements. */
  commitmentCount(): number {
    return this.declarationTypeCount("Committed");
  }

  /** Number of intermediate polynomials, counting array elements. */
  intermediateCount(): number {
    return this.declarationTypeCount("Intermediate");
  }

  /** Number of constant polynomials, counting array elements. */
  constantCount(): number {
    return this.declarationTypeCount("Constant");
  }

  constantPolysInSourceOrder(): Definition[] {
    return this.definitionsInSourceOrder("Constant");
  }

  committedPolysInSourceOrder(): Definition[] {
    return this.definitionsInSourceOrder("Committed");
  }

  definitionsInSourceOrder(polyType: PolynomialType): Definition[] {
    const result: Definition[] = [];
    for (const statement of this.sourceOrder) {
      if (statement.kind !== "Definition") continue;
      const definition = this.definitions.get(statement.name);
      if (definition && definition[0].polyType === polyType) {
        result.push(definition);
      }
    }
    return result;
  }

  /** Looks up a polynomial by absolute name. */
  polynomial(name: string): Polynomial | undefined {
    return this.definitions.get(name)?.[0];
  }

  private declarationTypeCount(polyType: PolynomialType): number {
    let count = 0;
    for (const [poly] of this.definitions.values()) {
      if (poly.polyType === polyType) {
        count += poly.length ?? 1;
      }
    }
    return count;
  }
}
