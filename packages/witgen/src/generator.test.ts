import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  Analyzed,
  FieldElement,
  analyzeString,
  type Definition,
  type Expression,
  type Polynomial,
} from "@pilkit/core";
import { WitgenError, type TraceEvent } from "./errors.js";
import { generateWitness, type WitnessResult } from "./generator.js";

function load(source: string): Analyzed {
  const result = analyzeString(source, "test.pil");
  assert.ok(result.analyzed, JSON.stringify(result.diagnostics));
  return result.analyzed;
}

function column(result: WitnessResult, name: string): bigint[] {
  const values = result.witness.get(name);
  assert.ok(values, `missing column ${name}`);
  return values.map((v) => v.toBigInt());
}

function witgenError(fn: () => unknown): WitgenError {
  try {
    fn();
  } catch (e) {
    assert.ok(e instanceof WitgenError, String(e));
    return e;
  }
  assert.fail("expected a WitgenError");
}

const FIBONACCI = `
namespace Main(4);
pol constant FIRST = [1] + [0]*;
pol commit x, y;
FIRST * (x - 1) = 0;
FIRST * (y - 1) = 0;
(1 - FIRST') * (x' - y) = 0;
(1 - FIRST') * (y' - x - y) = 0;
`;

describe("generateWitness", () => {
  it("follows transitions from row to row", () => {
    const result = generateWitness(load(FIBONACCI));
    assert.equal(result.degree, 4);
    assert.deepEqual([...result.witness.keys()], ["Main.x", "Main.y"]);
    assert.deepEqual(column(result, "Main.x"), [1n, 1n, 2n, 3n]);
    assert.deepEqual(column(result, "Main.y"), [1n, 2n, 3n, 5n]);
    assert.equal(result.defaulted, 0);
  });

  it("returns the fixed columns as well", () => {
    const result = generateWitness(load(FIBONACCI));
    assert.deepEqual(result.fixed.get("Main.FIRST")?.map((v) => v.toBigInt()), [1n, 0n, 0n, 0n]);
  });

  it("answers queries through the callback", () => {
    const analyzed = load(`
namespace Main(3);
pol commit a(i) query ("input", i);
pol commit b;
b = a + 1;
`);
    const asked: string[] = [];
    const result = generateWitness(analyzed, {
      query: (q) => {
        asked.push(q);
        const match = /^\("input", (\d+)\)$/.exec(q);
        return match?.[1] === undefined ? undefined : FieldElement.from(BigInt(match[1]) * 10n);
      },
    });
    assert.deepEqual(column(result, "Main.a"), [0n, 10n, 20n]);
    assert.deepEqual(column(result, "Main.b"), [1n, 11n, 21n]);
    assert.deepEqual(asked, ['("input", 0)', '("input", 1)', '("input", 2)']);
  });

  it("splits values along bit constraints", () => {
    const analyzed = load(`
namespace Main(1);
pol commit lo, hi;
lo * (1 - lo) = 0;
hi * (1 - hi) = 0;
lo + 2 * hi = 3;
`);
    const result = generateWitness(analyzed);
    assert.deepEqual(column(result, "Main.lo"), [1n]);
    assert.deepEqual(column(result, "Main.hi"), [1n]);
  });

  it("solves through lookups into fixed columns", () => {
    const analyzed = load(`
namespace Main(4);
pol constant A = [1, 2, 3, 4];
pol constant B = [10, 20, 30, 40];
pol commit x, y;
x = 3;
{ x, y } in { A, B };
`);
    assert.deepEqual(column(generateWitness(analyzed), "Main.y"), [30n, 30n, 30n, 30n]);
  });

  it("can default undetermined cells to zero", () => {
    const analyzed = load("namespace Main(2);\npol commit x, y;\nx + y = 3;\n");
    const result = generateWitness(analyzed, { unknownCells: "zero" });
    assert.equal(result.defaulted, 4);
    assert.deepEqual(column(result, "Main.x"), [0n, 0n]);
  });
});

/** `x = a` where the intermediates `a` and `b` refer to each other. */
function cyclicIntermediates(): Analyzed {
  const source = { file: "test.pil", line: 1 };
  const poly = (id: number, absoluteName: string, polyType: Polynomial["polyType"]): Polynomial => ({
    id,
    source,
    absoluteName,
    polyType,
    degree: 2,
  });
  const ref = (name: string): Expression => ({ kind: "PolynomialReference", reference: { name, next: false } });
  return new Analyzed({
    constants: new Map(),
    definitions: new Map<string, Definition>([
      ["Main.x", [poly(0, "Main.x", "Committed"), undefined]],
      ["Main.a", [poly(0, "Main.a", "Intermediate"), { kind: "Mapping", expr: ref("Main.b") }]],
      ["Main.b", [poly(1, "Main.b", "Intermediate"), { kind: "Mapping", expr: ref("Main.a") }]],
    ]),
    publicDeclarations: new Map(),
    identities: [{
      id: 0,
      kind: "Polynomial",
      source,
      left: { selector: { kind: "BinaryOperation", left: ref("Main.x"), op: "-", right: ref("Main.a") }, expressions: [] },
      right: { expressions: [] },
    }],
    sourceOrder: [
      { kind: "Definition", name: "Main.x" },
      { kind: "Definition", name: "Main.a" },
      { kind: "Definition", name: "Main.b" },
      { kind: "Identity", index: 0 },
    ],
  });
}

describe("generateWitness failures", () => {
  it("stops expanding intermediates that refer to each other", () => {
    const error = witgenError(() => generateWitness(cyclicIntermediates()));
    assert.equal(error.code, "E_INCOMPLETE");
    assert.deepEqual(error.details?.["columns"], ["Main.x"]);
    assert.match(error.message, /cyclic intermediate Main\.a/);
  });

  it("names the cells it could not determine", () => {
    const analyzed = load("namespace Main(2);\npol commit x, y;\nx + y = 3;\n");
    const error = witgenError(() => generateWitness(analyzed));
    assert.equal(error.code, "E_INCOMPLETE");
    assert.equal(error.row, 0);
    assert.deepEqual(error.details?.["columns"], ["Main.x", "Main.y"]);
    assert.equal(
      error.message,
      "Row 0: could not determine Main.x, Main.y.\n  Main.x + Main.y - 3 = 0: Columns [Main.x, Main.y] are not bit-constrained"
    );
  });

  it("stops on contradicting identities", () => {
    const analyzed = load("namespace Main(2);\npol commit x;\nx = 1;\nx = 2;\n");
    const error = witgenError(() => generateWitness(analyzed));
    assert.equal(error.code, "E_UNSAT");
    assert.equal(error.row, 0);
  });

  it("stops on conflicting bit constraints", () => {
    const analyzed = load(`
namespace Main(1);
pol commit lo, hi;
lo * (1 - lo) = 0;
hi * (1 - hi) = 0;
lo + 2 * hi = 5;
`);
    assert.equal(witgenError(() => generateWitness(analyzed)).code, "E_BITS");
  });

  it("reports failed lookups", () => {
    const analyzed = load(`
namespace Main(2);
pol constant A = [1, 2];
pol commit x, y;
x = 5;
{ x, y } in { A, A };
`);
    const error = witgenError(() => generateWitness(analyzed));
    assert.equal(error.code, "E_INCOMPLETE");
    assert.match(error.message, /Lookup into fixed columns failed: no match/);
  });

  it("checks the transition from the last row back to the first", () => {
    const analyzed = load(`
namespace Main(2);
pol constant FIRST = [1, 0];
pol commit x;
FIRST * x = 0;
x' = x + 1;
`);
    const error = witgenError(() => generateWitness(analyzed));
    assert.equal(error.code, "E_UNSAT");
    assert.equal(error.row, 0);
  });
});

describe("generateWitness trace", () => {
  it("emits run and row events", () => {
    const events: TraceEvent[] = [];
    generateWitness(load(FIBONACCI), { trace: (e) => events.push(e), runId: "test-run" });
    const [first] = events;
    const last = events[events.length - 1];
    assert.equal(first?.event, "run_start");
    assert.equal(last?.event, "run_end");
    assert.ok(events.every((e) => e.runId === "test-run"));
    assert.deepEqual(events.filter((e) => e.event === "row_start").map((e) => e.row), [0, 1, 2, 3]);
    assert.deepEqual(first?.data?.["witnessColumns"], ["Main.x", "Main.y"]);
  });

  it("closes a failed run with its error code", () => {
    const events: TraceEvent[] = [];
    const analyzed = load("namespace Main(2);\npol commit x;\nx = 1;\nx = 2;\n");
    witgenError(() => generateWitness(analyzed, { trace: (e) => events.push(e) }));
    const last = events[events.length - 1];
    assert.equal(last?.event, "run_end");
    assert.equal(last?.data?.["error"], "E_UNSAT");
    assert.equal(last?.data?.["rows"], 1);
  });

  it("reports unanswered queries once per row", () => {
    const events: TraceEvent[] = [];
    const analyzed = load("namespace Main(1);\npol commit a(i) query (\"input\", i);\n");
    generateWitness(analyzed, { query: () => undefined, unknownCells: "zero", trace: (e) => events.push(e) });
    const unanswered = events.filter((e) => e.event === "query_unanswered");
    assert.deepEqual(unanswered.map((e) => e.data), [{ query: '("input", 0)', column: "Main.a" }]);
    assert.equal(events.filter((e) => e.event === "unknown_defaulted").length, 1);
  });
});
