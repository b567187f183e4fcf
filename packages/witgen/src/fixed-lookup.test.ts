import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { FieldElement } from "@pilkit/core";
import { FixedLookup } from "./fixed-lookup.js";

const col = (...values: number[]) => values.map((v) => FieldElement.from(v));
const f = (v: number) => FieldElement.from(v);

describe("FixedLookup", () => {
  const lookup = new FixedLookup(new Map([
    ["A", col(1, 2, 3, 4)],
    ["B", col(10, 20, 20, 40)],
  ]));

  it("finds a unique row", () => {
    assert.deepEqual(lookup.lookup(["A", "B"], [f(3), undefined]), { kind: "unique", row: 2 });
    assert.deepEqual(lookup.lookup(["A", "B"], [undefined, f(40)]), { kind: "unique", row: 3 });
  });

  it("reports several matching rows", () => {
    assert.deepEqual(lookup.lookup(["B"], [f(20)]), { kind: "multiple" });
    assert.deepEqual(lookup.lookup(["A", "B"], [undefined, undefined]), { kind: "multiple" });
  });

  it("reports no match", () => {
    assert.deepEqual(lookup.lookup(["A"], [f(9)]), { kind: "none" });
    assert.deepEqual(lookup.lookup(["A", "B"], [f(1), f(20)]), { kind: "none" });
  });

  it("reads single values", () => {
    assert.equal(lookup.value("B", 3)?.toBigInt(), 40n);
    assert.equal(lookup.value("C", 0), undefined);
  });

  it("rejects unknown columns", () => {
    assert.throws(() => lookup.lookup(["C"], [f(1)]), /Unknown fixed column 'C'/);
  });
});
