/**
 * Row-by-row witness generation.
 *
 * Each row is solved by a fixed-point loop: every identity is processed
 * against the row (and the previous one, for identities with next-row
 * references) until a pass learns nothing new. Query columns are asked
 * for their values through a callback.
 */
import { FieldElement, formatIdentity, type Analyzed, type Identity } from "@pilkit/core";
import { OverlayBitConstraintSet, SimpleBitConstraintSet } from "./bit-constraints.js";
import type { ColumnMap } from "./constant-evaluator.js";
import {
  combineCauses,
  combineErrors,
  flattenCause,
  flattenError,
  formatEvalError,
  formatIncompleteCause,
  isFatalEvalError,
  isTerminalCause,
  type EvalError,
  type EvalValue,
  type IncompleteCause,
} from "./eval-result.js";
import { WitgenError, type TraceData, type TraceEvent, type TraceEventType, type WitgenErrorCode } from "./errors.js";
import { FixedData } from "./fixed-data.js";
import { FixedLookup } from "./fixed-lookup.js";
import { determineGlobalConstraints, type GlobalConstraints } from "./global-constraints.js";
import { IdentityProcessor } from "./identity-processor.js";
import { QueryProcessor, type QueryCallback } from "./query-processor.js";
import { WitnessColumnEvaluator, identityReferencesNextRow, type EvaluationMode } from "./witness-evaluator.js";

/** What to do with cells no identity or query could determine. */
export type UnknownCellPolicy = "fail" | "zero";

export interface GeneratorOptions {
  query?: QueryCallback;
  unknownCells?: UnknownCellPolicy;
  maxPassesPerRow?: number;
  trace?: (event: TraceEvent) => void;
  runId?: string;
}

export interface WitnessResult {
  degree: number;
  fixed: ColumnMap;
  /** Witness columns in declaration order. */
  witness: ColumnMap;
  /** Number of cells filled in by the `zero` policy. */
  defaulted: number;
}

export const DEFAULT_MAX_PASSES_PER_ROW = 100;

interface ScheduledIdentity {
  identity: Identity;
  mode: EvaluationMode;
  /** Captured by a global bit constraint; its incompleteness is not reported. */
  retained: boolean;
}

type Cell = FieldElement | undefined;

interface PassOutcome {
  progress: boolean;
  causes: Map<Identity, IncompleteCause>;
  unanswered: { query: string; column: string }[];
  error?: EvalError;
}

export class WitnessGenerator {
  private readonly fixed: FixedData;
  private readonly global: GlobalConstraints;
  private readonly identities: ScheduledIdentity[];
  private readonly processor: IdentityProcessor;
  private readonly queries?: QueryProcessor;
  private readonly rows: Cell[][] = [];
  private readonly policy: UnknownCellPolicy;
  private readonly maxPasses: number;
  private readonly runId: string;

  constructor(analyzed: Analyzed, private readonly options: GeneratorOptions = {}) {
    this.fixed = new FixedData(analyzed);
    this.global = determineGlobalConstraints(this.fixed);
    this.processor = new IdentityProcessor(this.fixed, new FixedLookup(this.fixed.fixedColumns));
    if (options.query) this.queries = new QueryProcessor(this.fixed, options.query);
    const retained = new Set(this.global.retained);
    this.identities = analyzed.identities.map((identity) => ({
      identity,
      mode: identityReferencesNextRow(analyzed, identity) ? "transition" : "row",
      retained: retained.has(identity),
    }));
    this.policy = options.unknownCells ?? "fail";
    this.maxPasses = options.maxPassesPerRow ?? DEFAULT_MAX_PASSES_PER_ROW;
    this.runId = options.runId ?? "witgen";
  }

  run(): WitnessResult {
    const startMs = Date.now();
    const degree = this.fixed.degree;
    this.emit("run_start", undefined, {
      degree,
      witnessColumns: this.fixed.witnessColumns.map((c) => c.name),
      identities: this.identities.length,
    });

    let defaulted = 0;
    try {
      for (let row = 0; row < degree; row++) {
        defaulted += this.solveRow(row);
      }
      if (degree > 0) this.checkWrapAround();
    } catch (e) {
      const error = e instanceof WitgenError ? e.code : "E_INTERNAL";
      this.emit("run_end", undefined, { rows: this.rows.length, error, durationMs: Date.now() - startMs });
      throw e;
    }

    const witness: ColumnMap = new Map();
    for (const column of this.fixed.witnessColumns) {
      witness.set(column.name, this.rows.map((cells) => cells[column.id] ?? FieldElement.ZERO));
    }
    this.emit("run_end", undefined, { rows: degree, defaulted, durationMs: Date.now() - startMs });
    return { degree, fixed: this.fixed.fixedColumns, witness, defaulted };
  }

  /** Solves one row; returns the number of cells defaulted to zero. */
  private solveRow(row: number): number {
    this.emit("row_start", row);
    const cells: Cell[] = new Array<Cell>(this.fixed.witnessCount).fill(undefined);
    this.rows.push(cells);
    const rowConstraints = new SimpleBitConstraintSet();
    const bits = new OverlayBitConstraintSet(rowConstraints, this.global.witnessConstraints);

    let outcome: PassOutcome = { progress: false, causes: new Map(), unanswered: [] };
    for (let pass = 0; pass < this.maxPasses; pass++) {
      outcome = { progress: false, causes: new Map(), unanswered: [] };
      for (const scheduled of this.identities) {
        // Row 0 has no previous row; the transition into it is checked at the end.
        if (scheduled.mode === "transition" && row === 0) continue;
        const { identity } = scheduled;
        const variables = new WitnessColumnEvaluator(this.fixed, this.rows, row, scheduled.mode);
        const result = this.processor.process(identity, variables, bits);
        if (!result.ok) {
          this.failIfFatal(result.error, row, identity);
          outcome.error = outcome.error ? combineErrors(outcome.error, result.error) : result.error;
          continue;
        }
        if (this.apply(result.value, row, rowConstraints, identity)) outcome.progress = true;
        if (result.value.status.kind === "Incomplete" && !scheduled.retained) {
          outcome.causes.set(identity, result.value.status.cause);
        }
      }
      if (this.processQueries(row, rowConstraints, outcome)) outcome.progress = true;
      this.emit("pass_end", row, { pass, progress: outcome.progress });
      if (!outcome.progress) break;
    }

    const defaulted = this.finishRow(row, cells, outcome);
    this.emit("row_end", row, { defaulted });
    return defaulted;
  }

  /** Applies learned constraints to the row; returns whether anything was new. */
  private apply(value: EvalValue, row: number, rowConstraints: SimpleBitConstraintSet, identity?: Identity): boolean {
    const cells = this.rows[row];
    if (!cells) return false;
    let progress = false;
    for (const [id, constraint] of value.constraints) {
      if (constraint.kind === "Assignment") {
        const existing = cells[id];
        if (existing === undefined) {
          cells[id] = constraint.value;
          progress = true;
        } else if (!existing.equals(constraint.value)) {
          const where = identity ? ` in ${formatIdentity(identity)}` : "";
          throw new WitgenError(
            "E_UNSAT",
            `Row ${row}: conflicting values for ${this.fixed.witnessName(id)}: ${existing.toString()} and ${constraint.value.toString()}${where}.`,
            row,
            identity?.source
          );
        }
      } else if (cells[id] === undefined && rowConstraints.bitConstraint(id) === undefined
        && this.global.witnessConstraints.bitConstraint(id) === undefined) {
        rowConstraints.set(id, constraint.constraint);
        progress = true;
      }
    }
    return progress;
  }

  private processQueries(row: number, rowConstraints: SimpleBitConstraintSet, outcome: PassOutcome): boolean {
    if (!this.queries) return false;
    const cells = this.rows[row];
    let progress = false;
    for (const column of this.fixed.witnessColumns) {
      if (!column.query || cells?.[column.id] !== undefined) continue;
      const variables = new WitnessColumnEvaluator(this.fixed, this.rows, row, "row");
      const value = this.queries.processQuery(column, row, variables);
      if (this.apply(value, row, rowConstraints)) progress = true;
      if (value.status.kind === "Incomplete") {
        for (const cause of flattenCause(value.status.cause)) {
          if (cause.kind === "NoQueryAnswer") outcome.unanswered.push({ query: cause.query, column: cause.column });
        }
      }
    }
    return progress;
  }

  private finishRow(row: number, cells: Cell[], outcome: PassOutcome): number {
    const unknown = this.fixed.witnessColumns.filter((c) => cells[c.id] === undefined);

    for (const { query, column } of outcome.unanswered) {
      this.emit("query_unanswered", row, { query, column });
    }
    for (const [identity, cause] of outcome.causes) {
      this.emit("identity_incomplete", row, {
        identity: formatIdentity(identity),
        cause: formatIncompleteCause(cause, this.nameOf),
        terminal: isTerminalCause(cause),
      });
    }
    if (outcome.error) {
      this.emit("identity_error", row, { error: formatEvalError(outcome.error) });
    }

    if (unknown.length === 0) {
      if (outcome.error) {
        throw new WitgenError("E_LOOKUP", `Row ${row}: ${formatEvalError(outcome.error)}`, row);
      }
      return 0;
    }

    if (this.policy === "zero") {
      for (const column of unknown) {
        cells[column.id] = FieldElement.ZERO;
        this.emit("unknown_defaulted", row, { column: column.name });
      }
      return unknown.length;
    }

    let cause: IncompleteCause = { kind: "NoProgressTransferring" };
    for (const c of outcome.causes.values()) cause = combineCauses(cause, c);
    const lines = [...outcome.causes].map(([identity, c]) =>
      `  ${formatIdentity(identity)}: ${formatIncompleteCause(c, this.nameOf).split("\n").join("; ")}`
    );
    if (outcome.error) lines.push(`  ${formatEvalError(outcome.error).split("\n").join("; ")}`);
    const names = unknown.map((c) => c.name);
    throw new WitgenError(
      "E_INCOMPLETE",
      [`Row ${row}: could not determine ${names.join(", ")}.`, ...lines].join("\n"),
      row,
      undefined,
      { columns: names, terminal: isTerminalCause(cause) }
    );
  }

  /** Checks identities with next-row references across the last and first rows. */
  private checkWrapAround(): void {
    const scratch = new SimpleBitConstraintSet();
    for (const scheduled of this.identities) {
      if (scheduled.mode !== "transition") continue;
      const { identity } = scheduled;
      const variables = new WitnessColumnEvaluator(this.fixed, this.rows, 0, "transition");
      const result = this.processor.process(identity, variables, this.global.witnessConstraints);
      if (!result.ok) {
        this.failIfFatal(result.error, 0, identity);
        throw new WitgenError("E_LOOKUP", `Row 0: ${formatIdentity(identity)}: ${formatEvalError(result.error)}`, 0, identity.source);
      }
      this.apply(result.value, 0, scratch, identity);
    }
  }

  private failIfFatal(error: EvalError, row: number, identity: Identity): void {
    if (!isFatalEvalError(error)) return;
    throw new WitgenError(
      errorCode(error),
      `Row ${row}: ${formatIdentity(identity)}: ${formatEvalError(error)}`,
      row,
      identity.source
    );
  }

  private readonly nameOf = (id: number): string => this.fixed.witnessName(id);

  private emit(event: TraceEventType, row?: number, data?: TraceData): void {
    if (this.options.trace) {
      this.options.trace({
        ts: new Date().toISOString(),
        runId: this.runId,
        event,
        row,
        data,
      });
    }
  }
}

function errorCode(error: EvalError): WitgenErrorCode {
  for (const e of flattenError(error)) {
    if (e.kind === "ConstraintUnsatisfiable") return "E_UNSAT";
    if (e.kind === "ConflictingBitConstraints") return "E_BITS";
    if (e.kind === "RowsExhausted") return "E_ROWS";
  }
  return "E_LOOKUP";
}

/** Generates fixed and witness columns for a program. */
export function generateWitness(analyzed: Analyzed, options: GeneratorOptions = {}): WitnessResult {
  return new WitnessGenerator(analyzed, options).run();
}
