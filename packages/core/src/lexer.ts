/**
 * PIL Lexer using Chevrotain.
 */
import { createToken, Lexer } from "chevrotain";

// Identifiers may be qualified with a namespace: `Main.x`.
export const Ident = createToken({
  name: "Ident",
  pattern: /[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*/,
});

// Keywords
export const Namespace = createToken({ name: "Namespace", pattern: /namespace/, longer_alt: Ident });
export const Constant = createToken({ name: "Constant", pattern: /constant/, longer_alt: Ident });
export const Connect = createToken({ name: "Connect", pattern: /connect/, longer_alt: Ident });
export const Commit = createToken({ name: "Commit", pattern: /commit/, longer_alt: Ident });
export const Public = createToken({ name: "Public", pattern: /public/, longer_alt: Ident });
export const Query = createToken({ name: "Query", pattern: /query/, longer_alt: Ident });
export const Match = createToken({ name: "Match", pattern: /match/, longer_alt: Ident });
export const Pol = createToken({ name: "Pol", pattern: /pol/, longer_alt: Ident });
export const In = createToken({ name: "In", pattern: /in/, longer_alt: Ident });
export const Is = createToken({ name: "Is", pattern: /is/, longer_alt: Ident });
export const Underscore = createToken({ name: "Underscore", pattern: /_/, longer_alt: Ident });

// `%N` style constants live in a flat, unnamespaced scope.
export const ConstIdent = createToken({
  name: "ConstIdent",
  pattern: /%[A-Za-z_][A-Za-z0-9_]*/,
});

// Literals
export const HexLit = createToken({ name: "HexLit", pattern: /0x[0-9a-fA-F]+/ });
export const DecLit = createToken({ name: "DecLit", pattern: /[0-9]+/ });
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\]|\\["\\\/bfnrt]|\\u[0-9a-fA-F]{4})*"/,
});

// Operator categories keep operands and operators in source order in the CST.
export const AdditiveOp = createToken({ name: "AdditiveOp", pattern: Lexer.NA });
export const MultiplicativeOp = createToken({ name: "MultiplicativeOp", pattern: Lexer.NA });
export const ShiftOp = createToken({ name: "ShiftOp", pattern: Lexer.NA });

export const StarStar = createToken({ name: "StarStar", pattern: /\*\*/ });
export const Shl = createToken({ name: "Shl", pattern: /<</, categories: ShiftOp });
export const Shr = createToken({ name: "Shr", pattern: />>/, categories: ShiftOp });
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: AdditiveOp });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: AdditiveOp });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: MultiplicativeOp });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: MultiplicativeOp });
export const Percent = createToken({ name: "Percent", pattern: /%/, categories: MultiplicativeOp });
export const Ampersand = createToken({ name: "Ampersand", pattern: /&/ });
export const Pipe = createToken({ name: "Pipe", pattern: /\|/ });
export const Caret = createToken({ name: "Caret", pattern: /\^/ });

// Punctuation
export const LBrace = createToken({ name: "LBrace", pattern: /\{/ });
export const RBrace = createToken({ name: "RBrace", pattern: /\}/ });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ });
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const FatArrow = createToken({ name: "FatArrow", pattern: /=>/ });
export const Equals = createToken({ name: "Equals", pattern: /=/ });
export const Quote = createToken({ name: "Quote", pattern: /'/ });

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t\r\n]+/,
  group: Lexer.SKIPPED,
});
export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\n\r]*/,
  group: Lexer.SKIPPED,
});
export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*[\s\S]*?\*\//,
  group: Lexer.SKIPPED,
});

// Token order matters: longer/more specific tokens first
export const allTokens = [
  WhiteSpace,
  LineComment,  // before Slash
  BlockComment,
  // Keywords (before Ident) - longer prefixes first
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
  ConstIdent,   // before Percent
  // Literals
  HexLit,       // before DecLit
  DecLit,
  StringLit,
  // Multi-char operators first
  StarStar,
  Shl,
  Shr,
  FatArrow,     // before Equals
  // Single-char operators & punctuation
  AdditiveOp,
  MultiplicativeOp,
  ShiftOp,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
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
  Equals,
  Quote,
];

export const PilLexer = new Lexer(allTokens);
