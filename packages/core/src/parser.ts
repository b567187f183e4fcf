/**
 * PIL Parser using Chevrotain.
 * Produces a PIL AST from tokens.
 */
import { CstParser, type CstElement, type CstNode, type IToken } from "chevrotain";
import {
  allTokens,
  Namespace,
  Constant,
  Connect,
  Commit,
  Public,
  Query,
  Match,
  Pol,
  In,
  Is,
  Underscore,
  Ident,
  ConstIdent,
  HexLit,
  DecLit,
  StringLit,
  AdditiveOp,
  MultiplicativeOp,
  ShiftOp,
  StarStar,
  Plus,
  Star,
  Ampersand,
  Pipe,
  Caret,
  LBrace,
  RBrace,
  LBracket,
  RBracket,
  LParen,
  RParen,
  Semicolon,
  Comma,
  FatArrow,
  Equals,
  Quote,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { PilLexer } from "./lexer.js";
import { makeDiag } from "./diagnostics.js";

class PilCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false, maxLookahead: 3, nodeLocationTracking: "full" });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.MANY(() => {
      this.SUBRULE(this.statement);
    });
  });

  statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.namespaceDecl) },
      { ALT: () => this.SUBRULE(this.constantDef) },
      { ALT: () => this.SUBRULE(this.polDecl) },
      { ALT: () => this.SUBRULE(this.publicDecl) },
      { ALT: () => this.SUBRULE(this.identityStmt) },
    ]);
  });

  namespaceDecl = this.RULE("namespaceDecl", () => {
    this.CONSUME(Namespace);
    this.CONSUME(Ident);
    this.CONSUME(LParen);
    this.SUBRULE(this.expr);
    this.CONSUME(RParen);
    this.OPTION(() => {
      this.CONSUME(Semicolon);
    });
  });

  constantDef = this.RULE("constantDef", () => {
    this.CONSUME(Constant);
    this.CONSUME(ConstIdent);
    this.CONSUME(Equals);
    this.SUBRULE(this.expr);
    this.CONSUME(Semicolon);
  });

  polDecl = this.RULE("polDecl", () => {
    this.CONSUME(Pol);
    this.OR([
      { ALT: () => this.SUBRULE(this.commitDecl) },
      { ALT: () => this.SUBRULE(this.constantDecl) },
      { ALT: () => this.SUBRULE(this.intermediateDecl) },
    ]);
    this.CONSUME(Semicolon);
  });

  commitDecl = this.RULE("commitDecl", () => {
    this.CONSUME(Commit);
    this.OR([
      { ALT: () => this.SUBRULE(this.queryDecl) },
      { ALT: () => this.SUBRULE(this.polNameList) },
    ]);
  });

  queryDecl = this.RULE("queryDecl", () => {
    this.CONSUME(Ident);
    this.CONSUME(LParen);
    this.SUBRULE(this.params);
    this.CONSUME(RParen);
    this.CONSUME(Query);
    this.SUBRULE(this.expr);
  });

  constantDecl = this.RULE("constantDecl", () => {
    this.CONSUME(Constant);
    this.OR([
      { ALT: () => this.SUBRULE(this.mappingDecl) },
      { ALT: () => this.SUBRULE(this.arrayDecl) },
      { ALT: () => this.SUBRULE(this.polNameList) },
    ]);
  });

  mappingDecl = this.RULE("mappingDecl", () => {
    this.CONSUME(Ident);
    this.CONSUME(LParen);
    this.SUBRULE(this.params);
    this.CONSUME(RParen);
    this.CONSUME(LBrace);
    this.SUBRULE(this.expr);
    this.CONSUME(RBrace);
  });

  arrayDecl = this.RULE("arrayDecl", () => {
    this.CONSUME(Ident);
    this.CONSUME(Equals);
    this.SUBRULE(this.arraySegment);
    this.MANY(() => {
      this.CONSUME(Plus);
      this.SUBRULE2(this.arraySegment);
    });
  });

  arraySegment = this.RULE("arraySegment", () => {
    this.CONSUME(LBracket);
    this.OPTION(() => {
      this.SUBRULE(this.expr);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.expr);
      });
    });
    this.CONSUME(RBracket);
    this.OPTION2(() => {
      this.CONSUME(Star);
    });
  });

  intermediateDecl = this.RULE("intermediateDecl", () => {
    this.CONSUME(Ident);
    this.CONSUME(Equals);
    this.SUBRULE(this.expr);
  });

  params = this.RULE("params", () => {
    this.CONSUME(Ident);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.CONSUME2(Ident);
    });
  });

  polNameList = this.RULE("polNameList", () => {
    this.SUBRULE(this.polName);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.polName);
    });
  });

  polName = this.RULE("polName", () => {
    this.CONSUME(Ident);
    this.OPTION(() => {
      this.CONSUME(LBracket);
      this.SUBRULE(this.expr);
      this.CONSUME(RBracket);
    });
  });

  publicDecl = this.RULE("publicDecl", () => {
    this.CONSUME(Public);
    this.CONSUME(Ident);
    this.CONSUME(Equals);
    this.CONSUME2(Ident);
    this.OPTION(() => {
      this.CONSUME(LBracket);
      this.SUBRULE(this.expr);
      this.CONSUME(RBracket);
    });
    this.CONSUME(LParen);
    this.SUBRULE2(this.expr);
    this.CONSUME(RParen);
    this.CONSUME(Semicolon);
  });

  identityStmt = this.RULE("identityStmt", () => {
    this.OR([
      {
        ALT: () => {
          this.SUBRULE(this.braced);
          this.SUBRULE(this.lookupOp);
          this.SUBRULE(this.selectedExprs);
        },
      },
      {
        ALT: () => {
          this.SUBRULE(this.expr);
          this.OR2([
            {
              ALT: () => {
                this.CONSUME(Equals);
                this.SUBRULE2(this.expr);
              },
            },
            {
              ALT: () => {
                this.SUBRULE2(this.braced);
                this.SUBRULE2(this.lookupOp);
                this.SUBRULE2(this.selectedExprs);
              },
            },
          ]);
        },
      },
    ]);
    this.CONSUME(Semicolon);
  });

  selectedExprs = this.RULE("selectedExprs", () => {
    this.OPTION(() => {
      this.SUBRULE(this.expr);
    });
    this.SUBRULE(this.braced);
  });

  braced = this.RULE("braced", () => {
    this.CONSUME(LBrace);
    this.SUBRULE(this.expr);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.expr);
    });
    this.CONSUME(RBrace);
  });

  lookupOp = this.RULE("lookupOp", () => {
    this.OR([
      { ALT: () => this.CONSUME(In) },
      { ALT: () => this.CONSUME(Is) },
      { ALT: () => this.CONSUME(Connect) },
    ]);
  });

  // --- Expressions, loosest binding first ---

  expr = this.RULE("expr", () => {
    this.SUBRULE(this.bitOr);
  });

  bitOr = this.RULE("bitOr", () => {
    this.SUBRULE(this.bitXor);
    this.MANY(() => {
      this.CONSUME(Pipe);
      this.SUBRULE2(this.bitXor);
    });
  });

  bitXor = this.RULE("bitXor", () => {
    this.SUBRULE(this.bitAnd);
    this.MANY(() => {
      this.CONSUME(Caret);
      this.SUBRULE2(this.bitAnd);
    });
  });

  bitAnd = this.RULE("bitAnd", () => {
    this.SUBRULE(this.shift);
    this.MANY(() => {
      this.CONSUME(Ampersand);
      this.SUBRULE2(this.shift);
    });
  });

  shift = this.RULE("shift", () => {
    this.SUBRULE(this.additive);
    this.MANY(() => {
      this.CONSUME(ShiftOp);
      this.SUBRULE2(this.additive);
    });
  });

  additive = this.RULE("additive", () => {
    this.SUBRULE(this.multiplicative);
    this.MANY(() => {
      this.CONSUME(AdditiveOp);
      this.SUBRULE2(this.multiplicative);
    });
  });

  multiplicative = this.RULE("multiplicative", () => {
    this.SUBRULE(this.power);
    this.MANY(() => {
      this.CONSUME(MultiplicativeOp);
      this.SUBRULE2(this.power);
    });
  });

  // right-associative
  power = this.RULE("power", () => {
    this.SUBRULE(this.unary);
    this.OPTION(() => {
      this.CONSUME(StarStar);
      this.SUBRULE(this.power);
    });
  });

  unary = this.RULE("unary", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(AdditiveOp);
          this.SUBRULE(this.unary);
        },
      },
      { ALT: () => this.SUBRULE(this.postfix) },
    ]);
  });

  postfix = this.RULE("postfix", () => {
    this.SUBRULE(this.primary);
    this.OPTION(() => {
      this.CONSUME(LBracket);
      this.SUBRULE(this.expr);
      this.CONSUME(RBracket);
    });
    this.OPTION2(() => {
      this.CONSUME(Quote);
    });
  });

  primary = this.RULE("primary", () => {
    this.OR([
      { ALT: () => this.CONSUME(HexLit) },
      { ALT: () => this.CONSUME(DecLit) },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(ConstIdent) },
      { ALT: () => this.SUBRULE(this.callOrRef) },
      { ALT: () => this.SUBRULE(this.parenOrTuple) },
      { ALT: () => this.SUBRULE(this.matchExpr) },
    ]);
  });

  // ident that might be followed by an argument list (function call)
  callOrRef = this.RULE("callOrRef", () => {
    this.CONSUME(Ident);
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.OPTION2(() => {
        this.SUBRULE(this.expr);
        this.MANY(() => {
          this.CONSUME(Comma);
          this.SUBRULE2(this.expr);
        });
      });
      this.CONSUME(RParen);
    });
  });

  parenOrTuple = this.RULE("parenOrTuple", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expr);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.expr);
    });
    this.CONSUME(RParen);
  });

  matchExpr = this.RULE("matchExpr", () => {
    this.CONSUME(Match);
    this.SUBRULE(this.expr);
    this.CONSUME(LBrace);
    this.SUBRULE(this.matchArm);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.matchArm);
    });
    this.OPTION(() => {
      this.CONSUME2(Comma); // trailing comma
    });
    this.CONSUME(RBrace);
  });

  matchArm = this.RULE("matchArm", () => {
    this.OR([
      { ALT: () => this.CONSUME(Underscore) },
      { ALT: () => this.SUBRULE(this.expr) },
    ]);
    this.CONSUME(FatArrow);
    this.SUBRULE2(this.expr);
  });
}

// Singleton parser instance
const cstParser = new PilCstParser();

// --- CST helpers ---

function isCstNode(element: CstElement): element is CstNode {
  return "children" in element;
}

function childNodes(cst: CstNode, name: string): CstNode[] {
  return (cst.children[name] ?? []).filter(isCstNode);
}

function childTokens(cst: CstNode, name: string): IToken[] {
  return (cst.children[name] ?? []).filter((e): e is IToken => !isCstNode(e));
}

function firstNode(cst: CstNode, name: string): CstNode {
  const [node] = childNodes(cst, name);
  if (!node) throw new Error(`Expected '${name}' in ${cst.name}`);
  return node;
}

function firstToken(cst: CstNode, name: string): IToken {
  const [token] = childTokens(cst, name);
  if (!token) throw new Error(`Expected ${name} token in ${cst.name}`);
  return token;
}

// --- CST to AST visitor ---

function tokenSpan(token: IToken, file: string): Span {
  return {
    file,
    startLine: token.startLine ?? 1,
    startCol: token.startColumn ?? 1,
    endLine: token.endLine ?? 1,
    endCol: (token.endColumn ?? 1) + 1,
  };
}

function cstSpan(node: CstNode, file: string): Span {
  const loc = node.location;
  if (loc) {
    return {
      file,
      startLine: loc.startLine ?? 1,
      startCol: loc.startColumn ?? 1,
      endLine: loc.endLine ?? 1,
      endCol: (loc.endColumn ?? 1) + 1,
    };
  }
  return { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
}

function joinSpans(start: Span, end: Span): Span {
  return {
    file: start.file,
    startLine: start.startLine,
    startCol: start.startCol,
    endLine: end.endLine,
    endCol: end.endCol,
  };
}

function visitProgram(cst: CstNode, file: string): AST.Program {
  return {
    kind: "Program",
    span: cstSpan(cst, file),
    statements: childNodes(cst, "statement").map((s) => visitStatement(s, file)),
  };
}

function visitStatement(cst: CstNode, file: string): AST.Stmt {
  const children = cst.children;
  if (children["namespaceDecl"]) return visitNamespaceDecl(firstNode(cst, "namespaceDecl"), file);
  if (children["constantDef"]) return visitConstantDef(firstNode(cst, "constantDef"), file);
  if (children["polDecl"]) return visitPolDecl(firstNode(cst, "polDecl"), file);
  if (children["publicDecl"]) return visitPublicDecl(firstNode(cst, "publicDecl"), file);
  if (children["identityStmt"]) return visitIdentityStmt(firstNode(cst, "identityStmt"), file);
  throw new Error("Unknown statement type");
}

function visitNamespaceDecl(cst: CstNode, file: string): AST.NamespaceDecl {
  return {
    kind: "NamespaceDecl",
    span: cstSpan(cst, file),
    name: firstToken(cst, "Ident").image,
    degree: visitExpr(firstNode(cst, "expr"), file),
  };
}

function visitConstantDef(cst: CstNode, file: string): AST.ConstantDef {
  return {
    kind: "ConstantDef",
    span: cstSpan(cst, file),
    name: firstToken(cst, "ConstIdent").image,
    value: visitExpr(firstNode(cst, "expr"), file),
  };
}

function visitPolDecl(cst: CstNode, file: string): AST.Stmt {
  const span = cstSpan(cst, file);
  const children = cst.children;
  if (children["commitDecl"]) {
    const commit = firstNode(cst, "commitDecl");
    if (commit.children["queryDecl"]) {
      const q = firstNode(commit, "queryDecl");
      return {
        kind: "PolQueryDecl",
        span,
        name: firstToken(q, "Ident").image,
        params: visitParams(firstNode(q, "params")),
        query: visitExpr(firstNode(q, "expr"), file),
      };
    }
    return { kind: "PolCommitDecl", span, names: visitPolNameList(firstNode(commit, "polNameList"), file) };
  }
  if (children["constantDecl"]) {
    const decl = firstNode(cst, "constantDecl");
    if (decl.children["mappingDecl"]) {
      const m = firstNode(decl, "mappingDecl");
      return {
        kind: "PolMappingDecl",
        span,
        name: firstToken(m, "Ident").image,
        params: visitParams(firstNode(m, "params")),
        body: visitExpr(firstNode(m, "expr"), file),
      };
    }
    if (decl.children["arrayDecl"]) {
      const a = firstNode(decl, "arrayDecl");
      return {
        kind: "PolArrayDecl",
        span,
        name: firstToken(a, "Ident").image,
        segments: childNodes(a, "arraySegment").map((s) => visitArraySegment(s, file)),
      };
    }
    return { kind: "PolConstantDecl", span, names: visitPolNameList(firstNode(decl, "polNameList"), file) };
  }
  if (children["intermediateDecl"]) {
    const i = firstNode(cst, "intermediateDecl");
    return {
      kind: "PolIntermediateDecl",
      span,
      name: firstToken(i, "Ident").image,
      value: visitExpr(firstNode(i, "expr"), file),
    };
  }
  throw new Error("Unknown polynomial declaration");
}

function visitParams(cst: CstNode): string[] {
  return childTokens(cst, "Ident").map((t) => t.image);
}

function visitPolNameList(cst: CstNode, file: string): AST.PolName[] {
  return childNodes(cst, "polName").map((p) => {
    const result: AST.PolName = {
      kind: "PolName",
      span: cstSpan(p, file),
      name: firstToken(p, "Ident").image,
    };
    if (p.children["expr"]) {
      result.length = visitExpr(firstNode(p, "expr"), file);
    }
    return result;
  });
}

function visitArraySegment(cst: CstNode, file: string): AST.ArraySegment {
  return {
    kind: "ArraySegment",
    span: cstSpan(cst, file),
    values: childNodes(cst, "expr").map((e) => visitExpr(e, file)),
    repeated: childTokens(cst, "Star").length > 0,
  };
}

function visitPublicDecl(cst: CstNode, file: string): AST.PublicDecl {
  const [name, poly] = childTokens(cst, "Ident");
  const exprs = childNodes(cst, "expr").map((e) => visitExpr(e, file));
  const result: AST.PublicDecl = {
    kind: "PublicDecl",
    span: cstSpan(cst, file),
    name: name.image,
    poly: poly.image,
    row: exprs[exprs.length - 1],
  };
  if (exprs.length === 2) {
    result.index = exprs[0];
  }
  return result;
}

function visitIdentityStmt(cst: CstNode, file: string): AST.PolynomialIdentity | AST.LookupIdentity {
  const span = cstSpan(cst, file);
  const exprs = childNodes(cst, "expr").map((e) => visitExpr(e, file));
  if (childTokens(cst, "Equals").length > 0) {
    return { kind: "PolynomialIdentity", span, left: exprs[0], right: exprs[1] };
  }
  const bracedNode = firstNode(cst, "braced");
  const left: AST.SelectedExprs = {
    kind: "SelectedExprs",
    span: exprs.length > 0 ? joinSpans(exprs[0].span, cstSpan(bracedNode, file)) : cstSpan(bracedNode, file),
    expressions: visitBraced(bracedNode, file),
  };
  if (exprs.length > 0) {
    left.selector = exprs[0];
  }
  return {
    kind: "LookupIdentity",
    span,
    op: visitLookupOp(firstNode(cst, "lookupOp")),
    left,
    right: visitSelectedExprs(firstNode(cst, "selectedExprs"), file),
  };
}

function visitSelectedExprs(cst: CstNode, file: string): AST.SelectedExprs {
  const result: AST.SelectedExprs = {
    kind: "SelectedExprs",
    span: cstSpan(cst, file),
    expressions: visitBraced(firstNode(cst, "braced"), file),
  };
  if (cst.children["expr"]) {
    result.selector = visitExpr(firstNode(cst, "expr"), file);
  }
  return result;
}

function visitBraced(cst: CstNode, file: string): AST.Expr[] {
  return childNodes(cst, "expr").map((e) => visitExpr(e, file));
}

function visitLookupOp(cst: CstNode): AST.LookupOp {
  if (cst.children["In"]) return "in";
  if (cst.children["Is"]) return "is";
  return "connect";
}

function visitExpr(cst: CstNode, file: string): AST.Expr {
  return visitBinaryChain(firstNode(cst, "bitOr"), file, "bitXor", "Pipe", visitBitXor);
}

function visitBitXor(cst: CstNode, file: string): AST.Expr {
  return visitBinaryChain(cst, file, "bitAnd", "Caret", visitBitAnd);
}

function visitBitAnd(cst: CstNode, file: string): AST.Expr {
  return visitBinaryChain(cst, file, "shift", "Ampersand", visitShift);
}

function visitShift(cst: CstNode, file: string): AST.Expr {
  return visitBinaryChain(cst, file, "additive", "ShiftOp", visitAdditive);
}

function visitAdditive(cst: CstNode, file: string): AST.Expr {
  return visitBinaryChain(cst, file, "multiplicative", "AdditiveOp", visitMultiplicative);
}

function visitMultiplicative(cst: CstNode, file: string): AST.Expr {
  return visitBinaryChain(cst, file, "power", "MultiplicativeOp", visitPower);
}

// Operands and operators of a left-associative chain, in source order.
function visitBinaryChain(
  cst: CstNode,
  file: string,
  operandRule: string,
  operatorToken: string,
  visitOperand: (node: CstNode, file: string) => AST.Expr
): AST.Expr {
  const operands = childNodes(cst, operandRule);
  const operators = childTokens(cst, operatorToken);
  let result = visitOperand(operands[0], file);
  operators.forEach((token, i) => {
    const right = visitOperand(operands[i + 1], file);
    result = {
      kind: "BinaryExpr",
      span: joinSpans(result.span, right.span),
      op: binaryOp(token),
      left: result,
      right,
    };
  });
  return result;
}

function binaryOp(token: IToken): AST.BinaryOp {
  const image = token.image;
  switch (image) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "%":
    case "**":
    case "&":
    case "|":
    case "^":
    case "<<":
    case ">>":
      return image;
    default:
      throw new Error(`Unknown operator '${image}'`);
  }
}

function visitPower(cst: CstNode, file: string): AST.Expr {
  const base = visitUnary(firstNode(cst, "unary"), file);
  if (!cst.children["power"]) return base;
  const exponent = visitPower(firstNode(cst, "power"), file);
  return { kind: "BinaryExpr", span: cstSpan(cst, file), op: "**", left: base, right: exponent };
}

function visitUnary(cst: CstNode, file: string): AST.Expr {
  if (cst.children["postfix"]) return visitPostfix(firstNode(cst, "postfix"), file);
  const op = firstToken(cst, "AdditiveOp").image === "-" ? "-" : "+";
  return {
    kind: "UnaryExpr",
    span: cstSpan(cst, file),
    op,
    operand: visitUnary(firstNode(cst, "unary"), file),
  };
}

function visitPostfix(cst: CstNode, file: string): AST.Expr {
  const base = visitPrimary(firstNode(cst, "primary"), file);
  const indexed = cst.children["expr"] !== undefined;
  const next = cst.children["Quote"] !== undefined;
  if (!indexed && !next) return base;
  if (base.kind !== "PolyRef") {
    throw new Error("Only polynomial references can be indexed or shifted to the next row.");
  }
  const result: AST.PolyRef = { ...base, span: cstSpan(cst, file), next };
  if (indexed) {
    result.index = visitExpr(firstNode(cst, "expr"), file);
  }
  return result;
}

function visitPrimary(cst: CstNode, file: string): AST.Expr {
  const children = cst.children;
  if (children["HexLit"] || children["DecLit"]) {
    const t = firstToken(cst, children["HexLit"] ? "HexLit" : "DecLit");
    return { kind: "NumberLiteral", span: tokenSpan(t, file), value: BigInt(t.image) };
  }
  if (children["StringLit"]) {
    const t = firstToken(cst, "StringLit");
    return { kind: "StrLiteral", span: tokenSpan(t, file), value: JSON.parse(t.image) as string };
  }
  if (children["ConstIdent"]) {
    const t = firstToken(cst, "ConstIdent");
    return { kind: "ConstantRef", span: tokenSpan(t, file), name: t.image };
  }
  if (children["callOrRef"]) return visitCallOrRef(firstNode(cst, "callOrRef"), file);
  if (children["parenOrTuple"]) {
    const p = firstNode(cst, "parenOrTuple");
    const items = childNodes(p, "expr").map((e) => visitExpr(e, file));
    if (items.length === 1) return items[0];
    return { kind: "TupleExpr", span: cstSpan(p, file), items };
  }
  if (children["matchExpr"]) return visitMatchExpr(firstNode(cst, "matchExpr"), file);
  throw new Error("Unknown expression type");
}

function visitCallOrRef(cst: CstNode, file: string): AST.Expr {
  const name = firstToken(cst, "Ident").image;
  if (cst.children["LParen"]) {
    return {
      kind: "CallExpr",
      span: cstSpan(cst, file),
      callee: name,
      args: childNodes(cst, "expr").map((e) => visitExpr(e, file)),
    };
  }
  return { kind: "PolyRef", span: cstSpan(cst, file), name, next: false };
}

function visitMatchExpr(cst: CstNode, file: string): AST.MatchExpr {
  return {
    kind: "MatchExpr",
    span: cstSpan(cst, file),
    scrutinee: visitExpr(firstNode(cst, "expr"), file),
    arms: childNodes(cst, "matchArm").map((arm) => {
      const exprs = childNodes(arm, "expr").map((e) => visitExpr(e, file));
      const result: AST.MatchCase = {
        kind: "MatchCase",
        span: cstSpan(arm, file),
        value: exprs[exprs.length - 1],
      };
      if (exprs.length === 2) {
        result.pattern = exprs[0];
      }
      return result;
    }),
  };
}

// --- Public API ---

export interface ParseResult {
  program?: AST.Program;
  diagnostics: Diagnostic[];
}

export function parse(source: string, file: string = "<stdin>"): ParseResult {
  const lexResult = PilLexer.tokenize(source);
  const diagnostics: Diagnostic[] = [];

  for (const err of lexResult.errors) {
    diagnostics.push(
      makeDiag(
        "E_LEX",
        err.message,
        {
          file,
          startLine: err.line ?? 1,
          startCol: err.column ?? 1,
          endLine: err.line ?? 1,
          endCol: (err.column ?? 1) + err.length,
        },
        "Check for invalid characters or unclosed strings."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  cstParser.input = lexResult.tokens;
  const cst = cstParser.program();

  for (const err of cstParser.errors) {
    const token = err.token;
    diagnostics.push(
      makeDiag(
        "E_PARSE",
        err.message,
        {
          file,
          startLine: token.startLine ?? 1,
          startCol: token.startColumn ?? 1,
          endLine: token.endLine ?? 1,
          endCol: (token.endColumn ?? 1) + 1,
        },
        "Check syntax near this location."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  try {
    const program = visitProgram(cst, file);
    return { program, diagnostics: [] };
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    diagnostics.push(makeDiag("E_AST", msg, cstSpan(cst, file)));
    return { diagnostics };
  }
}
