/**
 * Errors and trace events raised by witness generation.
 */
import type { SourceRef } from "@pilkit/core";

export type TraceValue = string | number | boolean | null | string[];
export type TraceData = Record<string, TraceValue>;

export type WitgenErrorCode =
  /** A fixed column could not be computed. */
  | "E_FIXED"
  /** Polynomials disagree on the number of rows. */
  | "E_DEGREE"
  | "E_UNSAT"
  | "E_BITS"
  | "E_ROWS"
  | "E_LOOKUP"
  | "E_INCOMPLETE";

export class WitgenError extends Error {
  code: WitgenErrorCode;
  row?: number;
  source?: SourceRef;
  details?: TraceData;

  constructor(code: WitgenErrorCode, message: string, row?: number, source?: SourceRef, details?: TraceData) {
    super(message);
    this.name = "WitgenError";
    this.code = code;
    this.row = row;
    this.source = source;
    this.details = details;
  }
}

export type TraceEventType =
  | "run_start"
  | "run_end"
  | "row_start"
  | "row_end"
  | "pass_end"
  | "identity_incomplete"
  | "identity_error"
  | "query_unanswered"
  | "unknown_defaulted";

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  row?: number;
  data?: TraceData;
}
