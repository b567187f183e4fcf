/**
 * @pilkit/witgen - symbolic evaluation and witness generation
 */
export * from "./eval-result.js";
export * from "./bit-constraints.js";
export { AffineExpression, formatSigned } from "./affine-expression.js";
export type { NameOf } from "./affine-expression.js";
export { ExpressionEvaluator, affine, unresolved } from "./expression-evaluator.js";
export type { AffineResult, SymbolicVariables } from "./expression-evaluator.js";
export { columnName, generateFixedColumns, programDegree } from "./constant-evaluator.js";
export type { ColumnMap } from "./constant-evaluator.js";
export { FixedData } from "./fixed-data.js";
export type { WitnessColumn } from "./fixed-data.js";
export { FixedLookup } from "./fixed-lookup.js";
export type { LookupOutcome } from "./fixed-lookup.js";
export { determineGlobalConstraints } from "./global-constraints.js";
export type { GlobalConstraints } from "./global-constraints.js";
export { QueryProcessor } from "./query-processor.js";
export type { QueryCallback } from "./query-processor.js";
export { IdentityProcessor } from "./identity-processor.js";
export { WitnessColumnEvaluator, identityReferencesNextRow, referencesNextRow } from "./witness-evaluator.js";
export type { EvaluationMode, WitnessRows } from "./witness-evaluator.js";
export { WitgenError } from "./errors.js";
export type { TraceData, TraceEvent, TraceEventType, TraceValue, WitgenErrorCode } from "./errors.js";
export { WitnessGenerator, generateWitness, DEFAULT_MAX_PASSES_PER_ROW } from "./generator.js";
export type { GeneratorOptions, UnknownCellPolicy, WitnessResult } from "./generator.js";
