/**
 * Diagnostics for lexing, parsing and analysis of PIL sources.
 */
import type { Span } from "./ast.js";

export type Severity = "error" | "warning";

export interface Diagnostic {
  code: string;
  message: string;
  severity?: Severity;
  span?: Span;
  hint?: string;
}

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  const d: Diagnostic = { code, message };
  if (span) d.span = span;
  if (hint) d.hint = hint;
  return d;
}

export function makeWarning(code: string, message: string, span?: Span): Diagnostic {
  return { ...makeDiag(code, message, span), severity: "warning" };
}

export function isError(d: Diagnostic): boolean {
  return d.severity !== "warning";
}

export function formatSpan(span: Span | undefined): string {
  return span ? `${span.file}:${span.startLine}:${span.startCol}` : "<unknown>";
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `${d.severity ?? "error"}[${d.code}]: ${d.message}\n  --> ${formatSpan(d.span)}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
