#!/usr/bin/env -S node --import tsx
/**
 * pilkit - PIL analyzer and witness generator CLI
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runCheck } from "./cmd-check.js";
import { runShow } from "./cmd-show.js";
import { runWitgen, type WitgenOptions } from "./cmd-witgen.js";
import { runTrace } from "./cmd-trace.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const program = new Command();

program
  .name("pilkit")
  .description("pilkit: Polynomial Identity Language analyzer and witness generator")
  .version(pkg.version);

program
  .command("check")
  .description("Parse and analyze a PIL file")
  .argument("<file>", "PIL source file to check")
  .option("--pretty", "Human-readable output", false)
  .option("--stable-json", "Stable machine-readable success output", false)
  .action(async (file: string, opts: { pretty?: boolean; stableJson?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("show")
  .description("Print the analyzed program")
  .argument("<file>", "PIL source file")
  .option("--output <path>", "Write to file instead of stdout")
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { output?: string; pretty?: boolean }) => {
    const code = await runShow(file, opts);
    process.exit(code);
  });

program
  .command("witgen")
  .description("Compute fixed and witness columns")
  .argument("<file>", "PIL source file (or - for stdin)")
  .option("--inputs <path>", "JSON file answering prover queries")
  .option("--output <path>", "Write columns as JSON to file")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--unknown-cells <policy>", "What to do with undetermined cells: fail or zero")
  .option("--max-passes <n>", "Maximum solver passes per row")
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: WitgenOptions) => {
    const code = await runWitgen(file, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["check", "show", "witgen", "trace", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
