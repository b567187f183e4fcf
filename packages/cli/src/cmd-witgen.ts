/**
 * pilkit witgen - compute fixed and witness columns for a PIL file
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import { z } from "zod";
import { FieldElement, analyzeString, formatDiagnostics, formatDiagnostic } from "@pilkit/core";
import { WitgenError, generateWitness } from "@pilkit/witgen";
import type { ColumnMap, QueryCallback, TraceEvent, UnknownCellPolicy } from "@pilkit/witgen";
import { ConfigError, resolveConfig } from "./config.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

const NUMBER_TEXT = /^-?(?:0x[0-9a-fA-F]+|[0-9]+)$/;

/** Query answers: rendered query string to a number or a decimal/hex string. */
export const inputsSchema = z.record(
  z.union([
    z.number().int().nonnegative(),
    z.string().regex(NUMBER_TEXT, "expected a decimal or 0x-prefixed hex number"),
  ])
);

export interface WitgenOptions {
  inputs?: string;
  trace?: string;
  output?: string;
  unknownCells?: string;
  maxPasses?: string;
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

export async function runWitgen(file: string, opts: WitgenOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };

  let source: string;
  try {
    source = file === "-" ? fs.readFileSync(0, "utf-8") : fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`);
    return 4;
  }

  const result = analyzeString(source, file);
  if (!result.analyzed) {
    console.error(formatDiagnostics(result.diagnostics, pretty));
    return 2;
  }

  let unknownCells: UnknownCellPolicy;
  let maxPassesPerRow: number;
  try {
    const { config } = resolveConfig(opts.cwd, opts.homeDir);
    unknownCells = config.unknownCells;
    maxPassesPerRow = config.maxPassesPerRow;
  } catch (e) {
    if (e instanceof ConfigError) {
      emitCliError("E_CONFIG", e.message);
      return 4;
    }
    throw e;
  }
  if (opts.unknownCells !== undefined) {
    if (opts.unknownCells !== "fail" && opts.unknownCells !== "zero") {
      emitCliError("E_USAGE", `--unknown-cells must be 'fail' or 'zero', got '${opts.unknownCells}'.`);
      return 4;
    }
    unknownCells = opts.unknownCells;
  }
  if (opts.maxPasses !== undefined) {
    const passes = Number(opts.maxPasses);
    if (!Number.isInteger(passes) || passes <= 0) {
      emitCliError("E_USAGE", `--max-passes must be a positive integer, got '${opts.maxPasses}'.`);
      return 4;
    }
    maxPassesPerRow = passes;
  }

  let query: QueryCallback | undefined;
  if (opts.inputs) {
    const answers = readInputs(opts.inputs);
    if (typeof answers === "string") {
      emitCliError("E_IO", answers);
      return 4;
    }
    query = (q) => answers.get(q);
  }

  let traceFd: number | null = null;
  let traceHandler: ((event: TraceEvent) => void) | undefined;
  if (opts.trace) {
    let fd: number;
    try {
      fd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`);
      return 4;
    }
    traceFd = fd;
    traceHandler = (event) => {
      try {
        fs.writeSync(fd, JSON.stringify(event) + "\n");
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new CliIoError(`Error writing trace file: ${msg}`);
      }
    };
  }

  try {
    const witness = generateWitness(result.analyzed, {
      query,
      unknownCells,
      maxPassesPerRow,
      trace: traceHandler,
      runId: crypto.randomUUID(),
    });
    if (witness.defaulted > 0) {
      console.error(`warning: ${witness.defaulted} undetermined cells were set to zero.`);
    }

    const json = JSON.stringify(
      { degree: witness.degree, fixed: columnsToJson(witness.fixed), witness: columnsToJson(witness.witness) },
      null,
      2
    );
    if (!opts.output) {
      console.log(json);
      return 0;
    }
    try {
      fs.writeFileSync(opts.output, json + "\n", "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error writing output file: ${msg}`);
      return 4;
    }
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message);
      return 4;
    }
    if (e instanceof WitgenError) {
      if (pretty) {
        let out = `error[${e.code}]: ${e.message}`;
        if (e.source) out += `\n  --> ${e.source.file}:${e.source.line}`;
        console.error(out);
      } else {
        console.error(
          JSON.stringify({ code: e.code, message: e.message, row: e.row, source: e.source, details: e.details })
        );
      }
      return 5;
    }
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_WITGEN", msg);
    return 5;
  } finally {
    if (traceFd !== null) fs.closeSync(traceFd);
  }
}

/** Returns the parsed answers, or an error message. */
function readInputs(inputsPath: string): Map<string, FieldElement> | string {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(inputsPath, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return `Error reading inputs file: ${msg}`;
  }
  const parsed = inputsSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
    );
    return `Invalid inputs file ${inputsPath}: ${issues.join("; ")}`;
  }
  const answers = new Map<string, FieldElement>();
  for (const [key, value] of Object.entries(parsed.data)) {
    answers.set(key, typeof value === "number" ? FieldElement.from(value) : FieldElement.parse(value));
  }
  return answers;
}

function columnsToJson(columns: ColumnMap): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [name, values] of columns) {
    out[name] = values.map((v) => v.toString());
  }
  return out;
}
