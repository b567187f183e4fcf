/**
 * Textual rendering of the analyzed representation.
 * Output is deterministic and follows source order.
 */
import {
  assertNever,
  type Analyzed,
  type BinaryOperator,
  type Expression,
  type FunctionValueDefinition,
  type Identity,
  type Polynomial,
  type PolynomialReference,
  type PublicDeclaration,
  type SelectedExpressions,
} from "./analyzed.js";

const INDENT = "    ";

// Precedence table for binary operators (higher = tighter binding)
const PRECEDENCE: Record<BinaryOperator, number> = {
  "|": 1,
  "^": 2,
  "&": 3,
  "<<": 4, ">>": 4,
  "+": 5, "-": 5,
  "*": 6, "/": 6, "%": 6,
  "**": 7,
};

function needsParens(child: Expression, parentOp: BinaryOperator, isRight: boolean): boolean {
  if (child.kind !== "BinaryOperation") return false;
  const childPrec = PRECEDENCE[child.op];
  const parentPrec = PRECEDENCE[parentOp];
  if (childPrec < parentPrec) return true;
  if (childPrec > parentPrec) return false;
  // `**` groups to the right, everything else to the left.
  return parentOp === "**" ? !isRight : isRight;
}

export function formatReference(reference: PolynomialReference): string {
  const index = reference.index !== undefined ? `[${reference.index}]` : "";
  return `${reference.name}${index}${reference.next ? "'" : ""}`;
}

export function formatExpression(expr: Expression): string {
  switch (expr.kind) {
    case "Constant":
      return expr.name;
    case "PolynomialReference":
      return formatReference(expr.reference);
    case "LocalVariableReference":
      return `$${expr.index}`;
    case "PublicReference":
      return `:${expr.name}`;
    case "Number":
      return expr.value.toString();
    case "String":
      return JSON.stringify(expr.value);
    case "Tuple":
      return `(${expr.items.map(formatExpression).join(", ")})`;
    case "BinaryOperation": {
      const left = formatExpression(expr.left);
      const right = formatExpression(expr.right);
      const l = needsParens(expr.left, expr.op, false) ? `(${left})` : left;
      const r = needsParens(expr.right, expr.op, true) ? `(${right})` : right;
      return `${l} ${expr.op} ${r}`;
    }
    case "UnaryOperation": {
      const operand = formatExpression(expr.operand);
      return expr.operand.kind === "BinaryOperation" ? `${expr.op}(${operand})` : `${expr.op}${operand}`;
    }
    case "FunctionCall":
      return `${expr.name}(${expr.args.map(formatExpression).join(", ")})`;
    case "MatchExpression": {
      const arms = expr.arms.map((arm) =>
        `${arm.pattern !== undefined ? arm.pattern.toString() : "_"} => ${formatExpression(arm.value)}`
      );
      return `match ${formatExpression(expr.scrutinee)} { ${arms.join(", ")} }`;
    }
    default:
      return assertNever(expr, "expression");
  }
}

export function formatSelectedExpressions(sel: SelectedExpressions): string {
  const body = `{ ${sel.expressions.map(formatExpression).join(", ")} }`;
  return sel.selector ? `${formatExpression(sel.selector)} ${body}` : body;
}

export function formatIdentity(identity: Identity): string {
  switch (identity.kind) {
    case "Polynomial": {
      const expr = identity.left.selector;
      return expr ? `${formatExpression(expr)} = 0` : "0 = 0";
    }
    case "Plookup":
      return `${formatSelectedExpressions(identity.left)} in ${formatSelectedExpressions(identity.right)}`;
    case "Permutation":
      return `${formatSelectedExpressions(identity.left)} is ${formatSelectedExpressions(identity.right)}`;
    case "Connect":
      return `${formatSelectedExpressions(identity.left)} connect ${formatSelectedExpressions(identity.right)}`;
    default:
      return assertNever(identity.kind, "identity kind");
  }
}

function namespaceOf(name: string): string {
  const dot = name.indexOf(".");
  return dot < 0 ? "" : name.slice(0, dot);
}

function formatDefinition(poly: Polynomial, value: FunctionValueDefinition | undefined): string {
  const name = poly.length !== undefined ? `${poly.absoluteName}[${poly.length}]` : poly.absoluteName;
  const keyword = poly.polyType === "Committed" ? "pol commit" : poly.polyType === "Constant" ? "pol constant" : "pol";
  if (!value) return `${keyword} ${name};`;
  switch (value.kind) {
    case "Mapping":
      return poly.polyType === "Intermediate"
        ? `${keyword} ${name} = ${formatExpression(value.expr)};`
        : `${keyword} ${name}($0) { ${formatExpression(value.expr)} };`;
    case "Query":
      return `${keyword} ${name}($0) query ${formatExpression(value.expr)};`;
    case "Array": {
      const segments = value.segments.map((s) => {
        const values = `[${s.values.map(formatExpression).join(", ")}]`;
        return s.repetitions === 1 ? values : `${values}*${s.repetitions}`;
      });
      return `${keyword} ${name} = ${segments.join(" + ")};`;
    }
    default:
      return assertNever(value, "function value");
  }
}

function formatPublic(decl: PublicDeclaration): string {
  return `public ${decl.name} = ${formatReference(decl.polynomial)}(${decl.index});`;
}

/** Renders a whole program: constants, then statements in source order. */
export function formatAnalyzed(analyzed: Analyzed): string {
  const lines: string[] = [];
  for (const [name, value] of analyzed.constants) {
    lines.push(`constant ${name} = ${value.toString()};`);
  }

  let currentNamespace: string | undefined;
  const enterNamespace = (name: string, degree: number): void => {
    const ns = namespaceOf(name);
    if (ns === currentNamespace) return;
    currentNamespace = ns;
    lines.push(`namespace ${ns}(${degree});`);
  };

  for (const statement of analyzed.sourceOrder) {
    switch (statement.kind) {
      case "Definition": {
        const definition = analyzed.definitions.get(statement.name);
        if (!definition) break;
        const [poly, value] = definition;
        enterNamespace(poly.absoluteName, poly.degree);
        lines.push(INDENT + formatDefinition(poly, value));
        break;
      }
      case "PublicDeclaration": {
        const decl = analyzed.publicDeclarations.get(statement.name);
        if (decl) lines.push(INDENT + formatPublic(decl));
        break;
      }
      case "Identity": {
        const identity = analyzed.identities[statement.index];
        if (identity) lines.push(INDENT + formatIdentity(identity) + ";");
        break;
      }
      default:
        assertNever(statement, "statement");
    }
  }
  return lines.join("\n") + "\n";
}
