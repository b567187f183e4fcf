/**
 * Tests for pilkit check and show command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCheck } from "./cmd-check.js";

async function captureCheck(
  file: string,
  opts: { pretty?: boolean; stableJson?: boolean }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runCheck(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

async function checkSource(
  source: string,
  opts: { pretty?: boolean; stableJson?: boolean } = {}
): Promise<{ code: number; stdout: string; stderr: string }> {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pilkit-cli-check-test-"));
  const filePath = path.join(tmpDir, "main.pil");
  fs.writeFileSync(filePath, source, "utf-8");
  try {
    return await captureCheck(filePath, opts);
  } finally {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
}

const VALID = `namespace Main(4);
pol constant FIRST = [1] + [0]*;
pol commit x, y;
pol sum = x + y;
FIRST * (x - 1) = 0;
`;

describe("pilkit check", () => {
  it("prints [] on success by default", async () => {
    const result = await checkSource(VALID);
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "[]");
    assert.equal(result.stderr, "");
  });

  it("prints stable success JSON with --stable-json", async () => {
    const result = await checkSource(VALID, { stableJson: true });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "{\"ok\":true,\"errors\":[]}");
  });

  it("prints counts with --pretty", async () => {
    const result = await checkSource(VALID, { pretty: true });
    assert.equal(result.code, 0);
    assert.equal(
      result.stdout,
      "No errors found.\n  polynomials: 2 committed, 1 constant, 1 intermediate; identities: 1"
    );
  });

  it("emits parse errors as JSON diagnostics", async () => {
    const result = await checkSource("namespace Main(4);\npol commit ;\n");
    assert.equal(result.code, 2);
    const diags = JSON.parse(result.stderr) as { code: string }[];
    assert.equal(diags[0]?.code, "E_PARSE");
  });

  it("emits analysis errors", async () => {
    const result = await checkSource("namespace Main(4);\npol commit x;\nx = y;\n");
    assert.equal(result.code, 2);
    const diags = JSON.parse(result.stderr) as { code: string; message: string }[];
    assert.deepEqual(diags.map((d) => [d.code, d.message]), [["E_UNKNOWN_REF", "Unknown polynomial 'y'."]]);
  });

  it("reports a negative array length as a diagnostic", async () => {
    const result = await checkSource("namespace Main(4);\npol commit x[-1];\n");
    assert.equal(result.code, 2);
    const diags = JSON.parse(result.stderr) as { code: string; message: string }[];
    assert.deepEqual(diags.map((d) => [d.code, d.message]), [
      ["E_INDEX", "Array length 18446744069414584320 is too large."],
    ]);
  });

  it("renders pretty diagnostics with a location", async () => {
    const result = await checkSource("namespace Main(4);\npol commit x;\nx = y;\n", { pretty: true });
    assert.equal(result.code, 2);
    assert.match(result.stderr, /^error\[E_UNKNOWN_REF\]: Unknown polynomial 'y'\.\n {2}--> .*main\.pil:3:5/);
  });

  it("returns exit code 4 with E_IO on file read failure", async () => {
    const missing = path.join(os.tmpdir(), `pilkit-missing-check-${Date.now()}.pil`);
    const result = await captureCheck(missing, {});
    assert.equal(result.code, 4);
    assert.ok(result.stderr.includes('"code":"E_IO"'));
  });
});
