/**
 * pilkit trace - witness generation trace summary
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  row: z.number().int().optional(),
  data: z.record(z.unknown()).optional(),
});

type TraceLine = z.infer<typeof traceLineSchema>;

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  malformedLines: number;
  degree?: number;
  rowsCompleted: number;
  passes: number;
  incompleteIdentities: number;
  identityErrors: number;
  unansweredQueries: number;
  defaultedCells: number;
  error?: string;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (e) {
    if (e instanceof SyntaxError) return undefined;
    throw e;
  }
  const parsed = traceLineSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export function summarizeTrace(lines: readonly string[]): TraceSummary | undefined {
  const events: TraceLine[] = [];
  let malformedLines = 0;
  for (const line of lines) {
    const event = parseLine(line);
    if (event) events.push(event);
    else malformedLines++;
  }

  const [first] = events;
  if (!first) return undefined;

  const summary: TraceSummary = {
    runId: first.runId,
    totalEvents: events.length,
    malformedLines,
    rowsCompleted: 0,
    passes: 0,
    incompleteIdentities: 0,
    identityErrors: 0,
    unansweredQueries: 0,
    defaultedCells: 0,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "run_start": {
        summary.startTime = ev.ts;
        const degree = ev.data?.["degree"];
        if (typeof degree === "number") summary.degree = degree;
        break;
      }
      case "run_end": {
        summary.endTime = ev.ts;
        const error = ev.data?.["error"];
        if (typeof error === "string") summary.error = error;
        break;
      }
      case "row_end":
        summary.rowsCompleted++;
        break;
      case "pass_end":
        summary.passes++;
        break;
      case "identity_incomplete":
        summary.incompleteIdentities++;
        break;
      case "identity_error":
        summary.identityErrors++;
        break;
      case "query_unanswered":
        summary.unansweredQueries++;
        break;
      case "unknown_defaulted":
        summary.defaultedCells++;
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs =
      new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }
  return summary;
}

export async function runTrace(
  file: string,
  opts: { json?: boolean }
): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const summary = summarizeTrace(content.split("\n").filter((l) => l.trim()));
  if (!summary) {
    console.error("No valid trace events found.");
    return 4;
  }

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:           ${summary.runId}`);
  console.log(`  Total events:     ${summary.totalEvents}`);
  if (summary.malformedLines > 0) {
    console.log(`  Malformed lines:  ${summary.malformedLines}`);
  }
  if (summary.degree !== undefined) {
    console.log(`  Degree:           ${summary.degree}`);
  }
  console.log(`  Rows completed:   ${summary.rowsCompleted}`);
  console.log(`  Passes:           ${summary.passes}`);
  console.log(`  Incomplete:       ${summary.incompleteIdentities}`);
  console.log(`  Identity errors:  ${summary.identityErrors}`);
  console.log(`  Unanswered:       ${summary.unansweredQueries}`);
  console.log(`  Defaulted cells:  ${summary.defaultedCells}`);
  if (summary.error) {
    console.log(`  Failed with:      ${summary.error}`);
  }
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:         ${summary.durationMs}ms`);
  }
  return 0;
}
