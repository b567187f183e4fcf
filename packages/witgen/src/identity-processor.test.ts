import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { FieldElement, analyzeString, type Analyzed, type Identity } from "@pilkit/core";
import { SimpleBitConstraintSet } from "./bit-constraints.js";
import { FixedData } from "./fixed-data.js";
import { FixedLookup } from "./fixed-lookup.js";
import { IdentityProcessor } from "./identity-processor.js";
import { WitnessColumnEvaluator, identityReferencesNextRow, type EvaluationMode } from "./witness-evaluator.js";
import type { EvalResult } from "./eval-result.js";

function load(source: string): Analyzed {
  const result = analyzeString(source, "test.pil");
  assert.ok(result.analyzed, JSON.stringify(result.diagnostics));
  return result.analyzed;
}

const analyzed = load(`
namespace Main(4);
pol constant A = [1, 2, 3, 4];
pol constant B = [10, 20, 20, 40];
pol commit x, y, s;
x' = x;
{ x, y } in { A, B };
s { x } in { A };
x * y = 0;
pol double = 2 * x;
double' = y;
`);
const fixed = new FixedData(analyzed);
const processor = new IdentityProcessor(fixed, new FixedLookup(fixed.fixedColumns));

type Cells = (number | undefined)[];

function identity(index: number): Identity {
  const found = analyzed.identities[index];
  assert.ok(found);
  return found;
}

function run(index: number, rows: Cells[], row: number, mode: EvaluationMode = "row"): EvalResult {
  const cells = rows.map((r) => r.map((v) => (v === undefined ? undefined : FieldElement.from(v))));
  const variables = new WitnessColumnEvaluator(fixed, cells, row, mode);
  return processor.process(identity(index), variables, new SimpleBitConstraintSet());
}

function assigned(result: EvalResult): [number, bigint][] {
  assert.ok(result.ok);
  return result.value.constraints.map(([id, c]) => [id, c.kind === "Assignment" ? c.value.toBigInt() : -1n]);
}

const unknownRow: Cells = [undefined, undefined, undefined];

describe("IdentityProcessor: polynomial identities", () => {
  it("waits for an unknown previous value", () => {
    const result = run(0, [unknownRow, unknownRow], 1, "transition");
    assert.ok(result.ok);
    assert.equal(result.value.isEmpty(), true);
    assert.deepEqual(result.value.status, {
      kind: "Incomplete",
      cause: { kind: "PreviousValueUnknown", column: "Main.x" },
    });
  });

  it("copies a known previous value", () => {
    assert.deepEqual(assigned(run(0, [[7, undefined, undefined], unknownRow], 1, "transition")), [[0, 7n]]);
  });

  it("reports quadratic terms", () => {
    const result = run(3, [unknownRow], 0);
    assert.ok(result.ok);
    assert.deepEqual(result.value.status, { kind: "Incomplete", cause: { kind: "QuadraticTerm" } });
  });

  it("shifts intermediates referenced on the next row", () => {
    // double' = y, with y from the previous row: 2 * x = 6
    assert.deepEqual(assigned(run(4, [[undefined, 6, undefined], unknownRow], 1, "transition")), [[0, 3n]]);
  });

  it("classifies identities by next-row references", () => {
    assert.deepEqual(analyzed.identities.map((i) => identityReferencesNextRow(analyzed, i)), [true, false, false, false, true]);
  });
});

describe("IdentityProcessor: lookups into fixed columns", () => {
  it("assigns the remaining values of a unique match", () => {
    assert.deepEqual(assigned(run(1, [[3, undefined, undefined]], 0)), [[1, 20n]]);
  });

  it("waits when several rows match", () => {
    const result = run(1, [[undefined, 20, undefined]], 0);
    assert.ok(result.ok);
    assert.deepEqual(result.value.status, { kind: "Incomplete", cause: { kind: "MultipleLookupMatches" } });
  });

  it("fails when no row matches", () => {
    assert.deepEqual(run(1, [[9, undefined, undefined]], 0), { ok: false, error: { kind: "FixedLookupFailed" } });
  });

  it("needs a constant left selector", () => {
    const result = run(2, [[2, undefined, undefined]], 0);
    assert.ok(result.ok);
    assert.deepEqual(result.value.status, { kind: "Incomplete", cause: { kind: "NonConstantLeftSelector" } });
  });

  it("skips inactive rows", () => {
    const result = run(2, [[9, undefined, 0]], 0);
    assert.ok(result.ok);
    assert.equal(result.value.isComplete(), true);
    assert.equal(result.value.isEmpty(), true);
  });
});
