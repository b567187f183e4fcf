/**
 * @pilkit/core - PIL front end and analyzed representation
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export * from "./analyzed.js";
export { FieldElement, MODULUS } from "./number.js";
export type { AbstractNumber, DegreeType } from "./number.js";
export { parse } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { analyze, analyzeString, foldBinary } from "./analyzer.js";
export type { AnalyzeResult } from "./analyzer.js";
export {
  formatAnalyzed,
  formatExpression,
  formatIdentity,
  formatReference,
  formatSelectedExpressions,
} from "./display.js";
