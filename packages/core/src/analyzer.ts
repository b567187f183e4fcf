/**
 * PIL Analyzer
 * Lowers a parsed program into the analyzed representation, reporting
 * semantic problems as diagnostics.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag, isError } from "./diagnostics.js";
import { parse } from "./parser.js";
import { FieldElement, type DegreeType } from "./number.js";
import {
  Analyzed,
  RepeatedArray,
  type BinaryOperator,
  type Definition,
  type Expression,
  type FunctionValueDefinition,
  type Identity,
  type IdentityKind,
  type MatchArm,
  type Polynomial,
  type PolynomialReference,
  type PolynomialType,
  type PublicDeclaration,
  type SelectedExpressions,
  type SourceRef,
  type StatementIdentifier,
} from "./analyzed.js";

export interface AnalyzeResult {
  analyzed?: Analyzed;
  diagnostics: Diagnostic[];
}

interface NamespaceScope {
  name: string;
  degree: DegreeType;
}

const LOOKUP_KINDS: Record<AST.LookupOp, IdentityKind> = {
  in: "Plookup",
  is: "Permutation",
  connect: "Connect",
};

class Lowering {
  private readonly diags: Diagnostic[] = [];
  private readonly constants = new Map<string, FieldElement>();
  private readonly polynomials = new Map<string, Polynomial>();
  private readonly publicNames = new Set<string>();
  private readonly definitions = new Map<string, Definition>();
  private readonly publicDeclarations = new Map<string, PublicDeclaration>();
  private readonly identities: Identity[] = [];
  private readonly sourceOrder: StatementIdentifier[] = [];
  private readonly intermediateSpans = new Map<string, Span>();
  private readonly polyCounters: Record<PolynomialType, number> = { Committed: 0, Constant: 0, Intermediate: 0 };
  private readonly identityCounters: Record<IdentityKind, number> = {
    Polynomial: 0,
    Plookup: 0,
    Permutation: 0,
    Connect: 0,
  };
  private publicCounter = 0;
  private namespace: NamespaceScope | undefined;

  run(program: AST.Program): AnalyzeResult {
    // Declarations first so that identities and intermediates may refer to
    // polynomials declared later in the file.
    for (const stmt of program.statements) {
      this.declare(stmt);
    }
    this.namespace = undefined;
    for (const stmt of program.statements) {
      this.lower(stmt);
    }
    this.checkIntermediateCycles();

    if (this.diags.some(isError)) {
      return { diagnostics: this.diags };
    }
    return {
      analyzed: new Analyzed({
        constants: this.constants,
        definitions: this.definitions,
        publicDeclarations: this.publicDeclarations,
        identities: this.identities,
        sourceOrder: this.sourceOrder,
      }),
      diagnostics: this.diags,
    };
  }

  // --- Pass 1: namespaces, constants and polynomial declarations ---

  private declare(stmt: AST.Stmt): void {
    switch (stmt.kind) {
      case "NamespaceDecl": {
        const value = this.evalConstant(stmt.degree);
        const degree = value && this.rowCount(value, "E_NOT_CONST", "Degree", stmt.degree.span);
        if (degree !== undefined) {
          this.namespace = { name: stmt.name, degree };
        }
        return;
      }
      case "ConstantDef": {
        if (this.constants.has(stmt.name)) {
          this.error("E_DUP_DEF", `Constant '${stmt.name}' is already defined.`, stmt.span);
          return;
        }
        const value = this.evalConstant(stmt.value);
        if (value !== undefined) {
          this.constants.set(stmt.name, value);
        }
        return;
      }
      case "PolCommitDecl":
        for (const n of stmt.names) this.declarePolynomial(n.name, "Committed", n.span, n.length);
        return;
      case "PolConstantDecl":
        for (const n of stmt.names) this.declarePolynomial(n.name, "Constant", n.span, n.length);
        return;
      case "PolQueryDecl":
        this.declarePolynomial(stmt.name, "Committed", stmt.span);
        return;
      case "PolMappingDecl":
      case "PolArrayDecl":
        this.declarePolynomial(stmt.name, "Constant", stmt.span);
        return;
      case "PolIntermediateDecl":
        this.declarePolynomial(stmt.name, "Intermediate", stmt.span);
        return;
      case "PublicDecl":
        if (this.publicNames.has(stmt.name)) {
          this.error("E_DUP_DEF", `Public '${stmt.name}' is already declared.`, stmt.span);
        }
        this.publicNames.add(stmt.name);
        return;
      case "PolynomialIdentity":
      case "LookupIdentity":
        return;
    }
  }

  private declarePolynomial(name: string, polyType: PolynomialType, span: Span, lengthExpr?: AST.Expr): void {
    const ns = this.namespace;
    if (!ns) {
      this.error("E_NO_NAMESPACE", `Polynomial '${name}' is declared outside of a namespace.`, span,
        "Start the file with 'namespace Name(degree);'.");
      return;
    }
    const absoluteName = this.absoluteName(name);
    if (this.polynomials.has(absoluteName)) {
      this.error("E_DUP_DEF", `Polynomial '${absoluteName}' is already declared.`, span);
      return;
    }
    let length: DegreeType | undefined;
    if (lengthExpr) {
      const value = this.evalConstant(lengthExpr);
      length = value && this.rowCount(value, "E_INDEX", "Array length", lengthExpr.span);
      if (length === undefined) return;
    }
    const poly: Polynomial = {
      id: this.polyCounters[polyType],
      source: sourceRef(span),
      absoluteName,
      polyType,
      degree: ns.degree,
      ...(length !== undefined ? { length } : {}),
    };
    this.polyCounters[polyType] += length ?? 1;
    this.polynomials.set(absoluteName, poly);
  }

  // --- Pass 2: definitions, publics and identities in source order ---

  private lower(stmt: AST.Stmt): void {
    switch (stmt.kind) {
      case "NamespaceDecl": {
        const value = this.evalConstant(stmt.degree, false);
        const degree = value && this.rowCount(value, "E_NOT_CONST", "Degree", stmt.degree.span, false);
        if (degree !== undefined) {
          this.namespace = { name: stmt.name, degree };
        }
        return;
      }
      case "ConstantDef":
        return;
      case "PolCommitDecl":
      case "PolConstantDecl":
        for (const n of stmt.names) this.define(n.name, undefined);
        return;
      case "PolQueryDecl": {
        const expr = this.lowerExpr(stmt.query, stmt.params);
        this.define(stmt.name, expr && { kind: "Query", expr });
        return;
      }
      case "PolMappingDecl": {
        const expr = this.lowerExpr(stmt.body, stmt.params);
        this.define(stmt.name, expr && { kind: "Mapping", expr });
        return;
      }
      case "PolIntermediateDecl": {
        const expr = this.lowerExpr(stmt.value);
        this.define(stmt.name, expr && { kind: "Mapping", expr });
        this.intermediateSpans.set(this.absoluteName(stmt.name), stmt.span);
        return;
      }
      case "PolArrayDecl": {
        const segments = this.lowerArray(stmt);
        this.define(stmt.name, segments && { kind: "Array", segments });
        return;
      }
      case "PublicDecl":
        this.lowerPublic(stmt);
        return;
      case "PolynomialIdentity": {
        const left = this.lowerExpr(stmt.left);
        const right = this.lowerExpr(stmt.right);
        if (!left || !right) return;
        this.addIdentity("Polynomial", stmt.span, {
          selector: { kind: "BinaryOperation", left, op: "-", right },
          expressions: [],
        }, { expressions: [] });
        return;
      }
      case "LookupIdentity": {
        const left = this.lowerSelected(stmt.left);
        const right = this.lowerSelected(stmt.right);
        if (!left || !right) return;
        if (left.expressions.length !== right.expressions.length) {
          this.error("E_ARITY", `Left side has ${left.expressions.length} expressions but right side has ${right.expressions.length}.`, stmt.span);
          return;
        }
        this.addIdentity(LOOKUP_KINDS[stmt.op], stmt.span, left, right);
        return;
      }
    }
  }

  private define(name: string, value: FunctionValueDefinition | undefined): void {
    const absoluteName = this.absoluteName(name);
    const poly = this.polynomials.get(absoluteName);
    // Not registered: the declaration already produced a diagnostic.
    if (!poly || this.definitions.has(absoluteName)) return;
    this.definitions.set(absoluteName, [poly, value]);
    this.sourceOrder.push({ kind: "Definition", name: absoluteName });
  }

  /** Intermediates are expanded in place, so none may depend on itself. */
  private checkIntermediateCycles(): void {
    const done = new Set<string>();
    const path: string[] = [];
    const visit = (name: string): void => {
      const cycleStart = path.indexOf(name);
      if (cycleStart >= 0) {
        const cycle = [...path.slice(cycleStart), name];
        const span = this.intermediateSpans.get(name);
        this.error("E_CYCLE", `Intermediate polynomial '${name}' depends on itself: ${cycle.join(" -> ")}.`, span);
        return;
      }
      if (done.has(name)) return;
      const definition = this.definitions.get(name);
      if (!definition) return;
      const [poly, value] = definition;
      if (poly.polyType !== "Intermediate" || value?.kind !== "Mapping") return;
      path.push(name);
      for (const dependency of referencedNames(value.expr)) visit(dependency);
      path.pop();
      done.add(name);
    };
    for (const name of this.definitions.keys()) visit(name);
  }

  private addIdentity(kind: IdentityKind, span: Span, left: SelectedExpressions, right: SelectedExpressions): void {
    this.identities.push({ id: this.identityCounters[kind]++, kind, source: sourceRef(span), left, right });
    this.sourceOrder.push({ kind: "Identity", index: this.identities.length - 1 });
  }

  private lowerArray(stmt: AST.PolArrayDecl): RepeatedArray[] | undefined {
    const degree = this.namespace?.degree ?? 0;
    const lowered: { values: Expression[]; repeated: boolean }[] = [];
    for (const segment of stmt.segments) {
      const values: Expression[] = [];
      for (const v of segment.values) {
        const e = this.lowerExpr(v);
        if (!e) return undefined;
        values.push(e);
      }
      lowered.push({ values, repeated: segment.repeated });
    }

    const repeatedCount = lowered.filter((s) => s.repeated).length;
    if (repeatedCount > 1) {
      this.error("E_ARRAY_FILL", `Array '${stmt.name}' has more than one repeated segment.`, stmt.span);
      return undefined;
    }
    const fixedSize = lowered.filter((s) => !s.repeated).reduce((n, s) => n + s.values.length, 0);
    const remaining = degree - fixedSize;

    const result: RepeatedArray[] = [];
    for (const s of lowered) {
      if (!s.repeated) {
        result.push(new RepeatedArray(s.values, 1));
        continue;
      }
      if (s.values.length === 0) {
        if (remaining !== 0) {
          this.error("E_ARRAY_FILL", `Empty repeated segment cannot fill ${remaining} rows of '${stmt.name}'.`, stmt.span);
          return undefined;
        }
        result.push(new RepeatedArray([], 0));
        continue;
      }
      if (remaining < 0 || remaining % s.values.length !== 0) {
        this.error("E_ARRAY_FILL",
          `Repeated segment of length ${s.values.length} cannot fill ${remaining} rows of '${stmt.name}'.`, stmt.span);
        return undefined;
      }
      const repetitions = remaining / s.values.length;
      if (repetitions > 0) {
        result.push(new RepeatedArray(s.values, repetitions));
      }
    }

    const total = result.reduce((n, r) => n + r.size(), 0);
    if (total !== degree) {
      this.error("E_ARRAY_FILL", `Array '${stmt.name}' has ${total} values but the degree is ${degree}.`, stmt.span,
        "Add a repeated segment such as '[0]*' to fill the column.");
      return undefined;
    }
    return result;
  }

  private lowerPublic(stmt: AST.PublicDecl): void {
    const reference = this.lowerReference(stmt.poly, stmt.index, false, stmt.span);
    const row = this.evalConstant(stmt.row);
    if (!reference || row === undefined) return;
    const index = this.rowCount(row, "E_PUBLIC", `Public '${stmt.name}' row`, stmt.row.span);
    if (index === undefined) return;
    const degree = this.namespace?.degree ?? 0;
    if (index >= degree) {
      this.error("E_PUBLIC", `Public '${stmt.name}' refers to row ${index} but the degree is ${degree}.`, stmt.span);
      return;
    }
    if (this.publicDeclarations.has(stmt.name)) return;
    this.publicDeclarations.set(stmt.name, {
      id: this.publicCounter++,
      source: sourceRef(stmt.span),
      name: stmt.name,
      polynomial: reference,
      index,
    });
    this.sourceOrder.push({ kind: "PublicDeclaration", name: stmt.name });
  }

  private lowerSelected(sel: AST.SelectedExprs): SelectedExpressions | undefined {
    const expressions: Expression[] = [];
    for (const e of sel.expressions) {
      const lowered = this.lowerExpr(e);
      if (!lowered) return undefined;
      expressions.push(lowered);
    }
    if (!sel.selector) return { expressions };
    const selector = this.lowerExpr(sel.selector);
    return selector && { selector, expressions };
  }

  // --- Expressions ---

  private lowerExpr(expr: AST.Expr, locals: readonly string[] = []): Expression | undefined {
    switch (expr.kind) {
      case "NumberLiteral":
        return { kind: "Number", value: FieldElement.from(expr.value) };
      case "StrLiteral":
        return { kind: "String", value: expr.value };
      case "ConstantRef":
        if (!this.constants.has(expr.name)) {
          this.error("E_UNKNOWN_CONST", `Unknown constant '${expr.name}'.`, expr.span);
          return undefined;
        }
        return { kind: "Constant", name: expr.name };
      case "PolyRef": {
        const local = locals.indexOf(expr.name);
        if (local >= 0 && !expr.index && !expr.next) {
          return { kind: "LocalVariableReference", index: local };
        }
        if (!expr.name.includes(".") && !expr.index && !expr.next
          && !this.polynomials.has(this.absoluteName(expr.name)) && this.publicNames.has(expr.name)) {
          return { kind: "PublicReference", name: expr.name };
        }
        const reference = this.lowerReference(expr.name, expr.index, expr.next, expr.span);
        return reference && { kind: "PolynomialReference", reference };
      }
      case "CallExpr": {
        const name = this.absoluteName(expr.callee);
        if (!this.polynomials.has(name)) {
          this.error("E_UNKNOWN_REF", `Call to unknown function '${expr.callee}'.`, expr.span);
          return undefined;
        }
        const args = this.lowerList(expr.args, locals);
        return args && { kind: "FunctionCall", name, args };
      }
      case "TupleExpr": {
        const items = this.lowerList(expr.items, locals);
        return items && { kind: "Tuple", items };
      }
      case "BinaryExpr": {
        const left = this.lowerExpr(expr.left, locals);
        const right = this.lowerExpr(expr.right, locals);
        if (!left || !right) return undefined;
        const op: BinaryOperator = expr.op;
        return { kind: "BinaryOperation", left, op, right };
      }
      case "UnaryExpr": {
        const operand = this.lowerExpr(expr.operand, locals);
        return operand && { kind: "UnaryOperation", op: expr.op, operand };
      }
      case "MatchExpr": {
        const scrutinee = this.lowerExpr(expr.scrutinee, locals);
        const arms: MatchArm[] = [];
        for (const arm of expr.arms) {
          const value = this.lowerExpr(arm.value, locals);
          if (!value) return undefined;
          if (!arm.pattern) {
            arms.push({ value });
            continue;
          }
          const pattern = this.evalConstant(arm.pattern);
          if (pattern === undefined) return undefined;
          arms.push({ pattern, value });
        }
        return scrutinee && { kind: "MatchExpression", scrutinee, arms };
      }
    }
  }

  private lowerList(items: AST.Expr[], locals: readonly string[]): Expression[] | undefined {
    const result: Expression[] = [];
    for (const item of items) {
      const e = this.lowerExpr(item, locals);
      if (!e) return undefined;
      result.push(e);
    }
    return result;
  }

  private lowerReference(
    name: string,
    indexExpr: AST.Expr | undefined,
    next: boolean,
    span: Span
  ): PolynomialReference | undefined {
    const absoluteName = this.absoluteName(name);
    const poly = this.polynomials.get(absoluteName);
    if (!poly) {
      this.error("E_UNKNOWN_REF", `Unknown polynomial '${name}'.`, span);
      return undefined;
    }
    if (!indexExpr) {
      if (poly.length !== undefined) {
        this.error("E_INDEX", `Array polynomial '${absoluteName}' must be indexed.`, span);
        return undefined;
      }
      return { name: absoluteName, next };
    }
    const value = this.evalConstant(indexExpr);
    const index = value && this.rowCount(value, "E_INDEX", "Index", indexExpr.span);
    if (index === undefined) return undefined;
    if (poly.length === undefined || index >= poly.length) {
      this.error("E_INDEX", `Index ${index} is out of range for '${absoluteName}'.`, span);
      return undefined;
    }
    return { name: absoluteName, index, next };
  }

  /** Folds an expression that must be a compile-time constant. */
  private evalConstant(expr: AST.Expr, report: boolean = true): FieldElement | undefined {
    switch (expr.kind) {
      case "NumberLiteral":
        return FieldElement.from(expr.value);
      case "ConstantRef": {
        const value = this.constants.get(expr.name);
        if (value === undefined && report) {
          this.error("E_UNKNOWN_CONST", `Unknown constant '${expr.name}'.`, expr.span);
        }
        return value;
      }
      case "UnaryExpr": {
        const v = this.evalConstant(expr.operand, report);
        if (v === undefined) return undefined;
        return expr.op === "-" ? v.neg() : v;
      }
      case "BinaryExpr": {
        const l = this.evalConstant(expr.left, report);
        const r = this.evalConstant(expr.right, report);
        if (l === undefined || r === undefined) return undefined;
        try {
          return foldBinary(l, expr.op, r);
        } catch (e) {
          if (report) {
            this.error("E_NOT_CONST", e instanceof Error ? e.message : String(e), expr.span);
          }
          return undefined;
        }
      }
      default:
        if (report) {
          this.error("E_NOT_CONST", "Expected a constant expression.", expr.span);
        }
        return undefined;
    }
  }

  /** A constant used as a degree, length or row; negative values wrap to huge ones. */
  private rowCount(value: FieldElement, code: string, what: string, span: Span, report: boolean = true): DegreeType | undefined {
    if (value.toBigInt() <= BigInt(Number.MAX_SAFE_INTEGER)) return value.toDegree();
    if (report) {
      this.error(code, `${what} ${value.toString()} is too large.`, span, "Negative numbers wrap around the field modulus.");
    }
    return undefined;
  }

  private absoluteName(name: string): string {
    if (name.includes(".") || !this.namespace) return name;
    return `${this.namespace.name}.${name}`;
  }

  private error(code: string, message: string, span?: Span, hint?: string): void {
    this.diags.push(makeDiag(code, message, span, hint));
  }
}

/** Polynomials referenced by an expression, in order of first appearance. */
function referencedNames(expr: Expression, out: Set<string> = new Set()): Set<string> {
  switch (expr.kind) {
    case "PolynomialReference":
      out.add(expr.reference.name);
      break;
    case "BinaryOperation":
      referencedNames(expr.left, out);
      referencedNames(expr.right, out);
      break;
    case "UnaryOperation":
      referencedNames(expr.operand, out);
      break;
    case "Tuple":
      for (const item of expr.items) referencedNames(item, out);
      break;
    case "FunctionCall":
      out.add(expr.name);
      for (const arg of expr.args) referencedNames(arg, out);
      break;
    case "MatchExpression":
      referencedNames(expr.scrutinee, out);
      for (const arm of expr.arms) referencedNames(arm.value, out);
      break;
    case "Constant":
    case "LocalVariableReference":
    case "PublicReference":
    case "Number":
    case "String":
      break;
  }
  return out;
}

function sourceRef(span: Span): SourceRef {
  return { file: span.file, line: span.startLine };
}

/** Applies a binary operator to two constants. */
export function foldBinary(l: FieldElement, op: BinaryOperator, r: FieldElement): FieldElement {
  switch (op) {
    case "+":
      return l.add(r);
    case "-":
      return l.sub(r);
    case "*":
      return l.mul(r);
    case "/":
      return l.div(r);
    case "%":
      return l.mod(r);
    case "**":
      return l.pow(r.toBigInt());
    case "&":
      return l.and(r);
    case "|":
      return l.or(r);
    case "^":
      return l.xor(r);
    case "<<":
      return l.shl(r);
    case ">>":
      return l.shr(r);
  }
}

export function analyze(program: AST.Program): AnalyzeResult {
  return new Lowering().run(program);
}

/** Parses and analyzes PIL source text. */
export function analyzeString(source: string, file: string = "<stdin>"): AnalyzeResult {
  const parsed = parse(source, file);
  if (!parsed.program) {
    return { diagnostics: parsed.diagnostics };
  }
  return analyze(parsed.program);
}
