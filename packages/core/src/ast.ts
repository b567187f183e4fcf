/**
 * PIL AST Node Definitions
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

// --- Literals ---
export interface NumberLiteral extends BaseNode {
  kind: "NumberLiteral";
  value: bigint;
}

export interface StrLiteral extends BaseNode {
  kind: "StrLiteral";
  value: string;
}

// --- References ---
export interface ConstantRef extends BaseNode {
  kind: "ConstantRef";
  name: string;
}

/** `x`, `Main.x`, `arr[2]`, `x'` */
export interface PolyRef extends BaseNode {
  kind: "PolyRef";
  name: string;
  index?: Expr;
  next: boolean;
}

// --- Expressions ---
export interface CallExpr extends BaseNode {
  kind: "CallExpr";
  callee: string;
  args: Expr[];
}

export interface TupleExpr extends BaseNode {
  kind: "TupleExpr";
  items: Expr[];
}

export type BinaryOp = "+" | "-" | "*" | "/" | "%" | "**" | "&" | "|" | "^" | "<<" | ">>";

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export type UnaryOp = "-" | "+";

export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  op: UnaryOp;
  operand: Expr;
}

export interface MatchCase extends BaseNode {
  kind: "MatchCase";
  /** Absent for the `_` arm. */
  pattern?: Expr;
  value: Expr;
}

export interface MatchExpr extends BaseNode {
  kind: "MatchExpr";
  scrutinee: Expr;
  arms: MatchCase[];
}

export type Expr =
  | NumberLiteral
  | StrLiteral
  | ConstantRef
  | PolyRef
  | CallExpr
  | TupleExpr
  | BinaryExpr
  | UnaryExpr
  | MatchExpr;

// --- Declarations ---
export interface NamespaceDecl extends BaseNode {
  kind: "NamespaceDecl";
  name: string;
  degree: Expr;
}

export interface ConstantDef extends BaseNode {
  kind: "ConstantDef";
  name: string;
  value: Expr;
}

export interface PolName extends BaseNode {
  kind: "PolName";
  name: string;
  length?: Expr;
}

export interface PolCommitDecl extends BaseNode {
  kind: "PolCommitDecl";
  names: PolName[];
}

export interface PolQueryDecl extends BaseNode {
  kind: "PolQueryDecl";
  name: string;
  params: string[];
  query: Expr;
}

export interface PolConstantDecl extends BaseNode {
  kind: "PolConstantDecl";
  names: PolName[];
}

export interface PolMappingDecl extends BaseNode {
  kind: "PolMappingDecl";
  name: string;
  params: string[];
  body: Expr;
}

export interface ArraySegment extends BaseNode {
  kind: "ArraySegment";
  values: Expr[];
  /** `[..]*`: repeat to fill the remaining rows. */
  repeated: boolean;
}

export interface PolArrayDecl extends BaseNode {
  kind: "PolArrayDecl";
  name: string;
  segments: ArraySegment[];
}

export interface PolIntermediateDecl extends BaseNode {
  kind: "PolIntermediateDecl";
  name: string;
  value: Expr;
}

export interface PublicDecl extends BaseNode {
  kind: "PublicDecl";
  name: string;
  poly: string;
  index?: Expr;
  row: Expr;
}

// --- Identities ---
export interface PolynomialIdentity extends BaseNode {
  kind: "PolynomialIdentity";
  left: Expr;
  right: Expr;
}

export interface SelectedExprs extends BaseNode {
  kind: "SelectedExprs";
  selector?: Expr;
  expressions: Expr[];
}

export type LookupOp = "in" | "is" | "connect";

export interface LookupIdentity extends BaseNode {
  kind: "LookupIdentity";
  op: LookupOp;
  left: SelectedExprs;
  right: SelectedExprs;
}

export type Stmt =
  | NamespaceDecl
  | ConstantDef
  | PolCommitDecl
  | PolQueryDecl
  | PolConstantDecl
  | PolMappingDecl
  | PolArrayDecl
  | PolIntermediateDecl
  | PublicDecl
  | PolynomialIdentity
  | LookupIdentity;

// --- Program ---
export interface Program extends BaseNode {
  kind: "Program";
  statements: Stmt[];
}
