/**
 * Tests for pilkit witgen command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runWitgen, type WitgenOptions } from "./cmd-witgen.js";
import { summarizeTrace } from "./cmd-trace.js";

interface Captured {
  code: number;
  stdout: string;
  stderr: string;
}

async function captureWitgen(file: string, opts: WitgenOptions): Promise<Captured> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runWitgen(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

/** Runs in a fresh directory that also serves as home, so no real config is read. */
async function withProgram(
  source: string,
  fn: (dir: string, file: string) => Promise<void>
): Promise<void> {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pilkit-cli-witgen-test-"));
  const filePath = path.join(tmpDir, "main.pil");
  fs.writeFileSync(filePath, source, "utf-8");
  try {
    await fn(tmpDir, filePath);
  } finally {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
}

interface ColumnsJson {
  degree: number;
  fixed: Record<string, string[]>;
  witness: Record<string, string[]>;
}

const FIBONACCI = `namespace Main(4);
pol constant FIRST = [1] + [0]*;
pol commit x, y;
FIRST * (x - 1) = 0;
FIRST * (y - 1) = 0;
(1 - FIRST') * (x' - y) = 0;
(1 - FIRST') * (y' - x - y) = 0;
`;

const QUERIES = `namespace Main(2);
pol commit a(i) query ("input", i);
pol commit b;
b = a + 1;
`;

const UNDERDETERMINED = "namespace Main(2);\npol commit x, y;\nx + y = 3;\n";

describe("pilkit witgen", () => {
  it("prints fixed and witness columns as JSON", async () => {
    await withProgram(FIBONACCI, async (dir, file) => {
      const result = await captureWitgen(file, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);
      assert.equal(result.stderr, "");
      const columns = JSON.parse(result.stdout) as ColumnsJson;
      assert.equal(columns.degree, 4);
      assert.deepEqual(columns.fixed, { "Main.FIRST": ["1", "0", "0", "0"] });
      assert.deepEqual(columns.witness, {
        "Main.x": ["1", "1", "2", "3"],
        "Main.y": ["1", "2", "3", "5"],
      });
    });
  });

  it("answers queries from --inputs", async () => {
    await withProgram(QUERIES, async (dir, file) => {
      const inputs = path.join(dir, "inputs.json");
      fs.writeFileSync(inputs, JSON.stringify({ '("input", 0)': 5, '("input", 1)': "0x10" }));
      const result = await captureWitgen(file, { inputs, cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);
      const columns = JSON.parse(result.stdout) as ColumnsJson;
      assert.deepEqual(columns.witness, { "Main.a": ["5", "16"], "Main.b": ["6", "17"] });
    });
  });

  it("rejects malformed inputs", async () => {
    await withProgram(QUERIES, async (dir, file) => {
      const inputs = path.join(dir, "inputs.json");
      fs.writeFileSync(inputs, JSON.stringify({ '("input", 0)': "five" }));
      const result = await captureWitgen(file, { inputs, cwd: dir, homeDir: dir, pretty: true });
      assert.equal(result.code, 4);
      assert.match(result.stderr, /^error\[E_IO\]: Invalid inputs file .*inputs\.json: \("input", 0\): expected a decimal/);
    });
  });

  it("writes columns with --output", async () => {
    await withProgram(FIBONACCI, async (dir, file) => {
      const output = path.join(dir, "columns.json");
      const result = await captureWitgen(file, { output, cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);
      assert.equal(result.stdout, "");
      const columns = JSON.parse(fs.readFileSync(output, "utf-8")) as ColumnsJson;
      assert.deepEqual(columns.witness["Main.y"], ["1", "2", "3", "5"]);
    });
  });

  it("returns exit code 5 when cells stay undetermined", async () => {
    await withProgram(UNDERDETERMINED, async (dir, file) => {
      const result = await captureWitgen(file, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 5);
      const error = JSON.parse(result.stderr) as { code: string; row: number; details: { columns: string[] } };
      assert.equal(error.code, "E_INCOMPLETE");
      assert.equal(error.row, 0);
      assert.deepEqual(error.details.columns, ["Main.x", "Main.y"]);
    });
  });

  it("defaults undetermined cells with --unknown-cells zero", async () => {
    await withProgram(UNDERDETERMINED, async (dir, file) => {
      const result = await captureWitgen(file, { unknownCells: "zero", cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);
      assert.equal(result.stderr, "warning: 4 undetermined cells were set to zero.");
      const columns = JSON.parse(result.stdout) as ColumnsJson;
      assert.deepEqual(columns.witness["Main.x"], ["0", "0"]);
    });
  });

  it("reads the unknown cell policy from the project config", async () => {
    await withProgram(UNDERDETERMINED, async (dir, file) => {
      fs.writeFileSync(path.join(dir, ".pilkit.json"), JSON.stringify({ version: 1, unknownCells: "zero" }));
      const result = await captureWitgen(file, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);
    });
  });

  it("returns exit code 4 for an invalid config", async () => {
    await withProgram(FIBONACCI, async (dir, file) => {
      fs.writeFileSync(path.join(dir, ".pilkit.json"), JSON.stringify({ version: 1, maxPassesPerRow: 0 }));
      const result = await captureWitgen(file, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 4);
      assert.ok(result.stderr.includes('"code":"E_CONFIG"'));
    });
  });

  it("rejects an unknown cell policy on the command line", async () => {
    await withProgram(FIBONACCI, async (dir, file) => {
      const result = await captureWitgen(file, { unknownCells: "guess", cwd: dir, homeDir: dir });
      assert.equal(result.code, 4);
      assert.ok(result.stderr.includes('"code":"E_USAGE"'));
    });
  });

  it("returns exit code 2 on analysis errors", async () => {
    await withProgram("namespace Main(2);\npol commit x;\nx = z;\n", async (dir, file) => {
      const result = await captureWitgen(file, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 2);
    });
  });

  it("writes a JSONL trace that the trace summary reads", async () => {
    await withProgram(FIBONACCI, async (dir, file) => {
      const trace = path.join(dir, "trace.jsonl");
      const result = await captureWitgen(file, { trace, cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);
      const lines = fs.readFileSync(trace, "utf-8").split("\n").filter((l) => l.trim());
      const first = JSON.parse(lines[0] ?? "{}") as { event: string; runId: string };
      assert.equal(first.event, "run_start");
      assert.match(first.runId, /^[0-9a-f-]{36}$/);

      const summary = summarizeTrace(lines);
      assert.ok(summary);
      assert.equal(summary.degree, 4);
      assert.equal(summary.rowsCompleted, 4);
      assert.equal(summary.malformedLines, 0);
      assert.equal(summary.error, undefined);
    });
  });

  it("records the failure code at the end of a failed trace", async () => {
    await withProgram(UNDERDETERMINED, async (dir, file) => {
      const trace = path.join(dir, "trace.jsonl");
      const result = await captureWitgen(file, { trace, cwd: dir, homeDir: dir });
      assert.equal(result.code, 5);
      const summary = summarizeTrace(fs.readFileSync(trace, "utf-8").split("\n").filter((l) => l.trim()));
      assert.equal(summary?.error, "E_INCOMPLETE");
      assert.equal(summary?.rowsCompleted, 0);
    });
  });
});
