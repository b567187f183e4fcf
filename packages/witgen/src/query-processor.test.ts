import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { FieldElement, analyzeString, type Analyzed } from "@pilkit/core";
import { FixedData } from "./fixed-data.js";
import { QueryProcessor } from "./query-processor.js";
import { WitnessColumnEvaluator } from "./witness-evaluator.js";

function load(source: string): Analyzed {
  const result = analyzeString(source, "test.pil");
  assert.ok(result.analyzed, JSON.stringify(result.diagnostics));
  return result.analyzed;
}

const fixed = new FixedData(load(`
namespace Main(2);
pol commit a(i) query ("input", i);
pol commit b(i) query match i { 0 => "first", _ => ("rest", i * 10) };
pol commit c(i) query ("copy", a);
`));

const answers = new Map<string, FieldElement>([
  ['("input", 0)', FieldElement.from(5)],
  ['("rest", 10)', FieldElement.from(6)],
]);
const processor = new QueryProcessor(fixed, (query) => answers.get(query));

function column(name: string) {
  const found = fixed.witnessColumns.find((c) => c.name === name);
  assert.ok(found);
  return found;
}

function runQuery(name: string, row: number, cells: (FieldElement | undefined)[][]) {
  return processor.processQuery(column(name), row, new WitnessColumnEvaluator(fixed, cells, row, "row"));
}

describe("QueryProcessor", () => {
  it("assigns answered queries", () => {
    const value = runQuery("Main.a", 0, [[undefined, undefined, undefined]]);
    assert.equal(value.isComplete(), true);
    assert.equal(value.constraints.length, 1);
    const [[id, constraint]] = value.constraints;
    assert.equal(id, 0);
    assert.equal(constraint.kind === "Assignment" && constraint.value.toBigInt(), 5n);
  });

  it("interpolates match arms", () => {
    const rows = [[undefined, undefined, undefined], [undefined, undefined, undefined]];
    const value = runQuery("Main.b", 1, rows);
    assert.equal(value.isComplete(), true);
    assert.equal(value.constraints[0]?.[0], 1);
  });

  it("reports unanswered queries", () => {
    const value = runQuery("Main.b", 0, [[undefined, undefined, undefined]]);
    assert.deepEqual(value.status, {
      kind: "Incomplete",
      cause: { kind: "NoQueryAnswer", query: "\"first\"", column: "Main.b" },
    });
  });

  it("waits for non-constant arguments", () => {
    const value = runQuery("Main.c", 0, [[undefined, undefined, undefined]]);
    assert.deepEqual(value.status, {
      kind: "Incomplete",
      cause: { kind: "ExpressionEvaluationUnimplemented", detail: "query argument Main.a is not constant" },
    });
    const known = runQuery("Main.c", 0, [[FieldElement.from(5), undefined, undefined]]);
    assert.deepEqual(known.status, {
      kind: "Incomplete",
      cause: { kind: "NoQueryAnswer", query: "(\"copy\", 5)", column: "Main.c" },
    });
  });
});
