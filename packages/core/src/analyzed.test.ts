import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { Analyzed, RepeatedArray, isArray, type Definition, type Expression, type Polynomial } from "./analyzed.js";
import { FieldElement } from "./number.js";

const one: Expression = { kind: "Number", value: FieldElement.ONE };

function poly(id: number, absoluteName: string, polyType: Polynomial["polyType"], length?: number): Polynomial {
  return {
    id,
    source: { file: "test.pil", line: 1 },
    absoluteName,
    polyType,
    degree: 8,
    ...(length !== undefined ? { length } : {}),
  };
}

function program(): Analyzed {
  const b = poly(0, "Main.b", "Constant");
  const a = poly(0, "Main.a", "Committed", 3);
  const c = poly(3, "Main.c", "Committed");
  const s = poly(0, "Main.s", "Intermediate");
  return new Analyzed({
    constants: new Map([["%N", FieldElement.from(8)]]),
    definitions: new Map<string, Definition>([
      ["Main.c", [c, undefined]],
      ["Main.a", [a, undefined]],
      ["Main.b", [b, { kind: "Array", segments: [new RepeatedArray([one], 8)] }]],
      ["Main.s", [s, { kind: "Mapping", expr: one }]],
    ]),
    publicDeclarations: new Map(),
    identities: [],
    sourceOrder: [
      { kind: "Definition", name: "Main.b" },
      { kind: "Definition", name: "Main.a" },
      { kind: "Definition", name: "Main.s" },
      { kind: "Definition", name: "Main.c" },
    ],
  });
}

describe("RepeatedArray", () => {
  it("counts repeated elements", () => {
    assert.equal(new RepeatedArray([one, one], 3).size(), 6);
    assert.equal(new RepeatedArray([], 0).size(), 0);
    assert.equal(new RepeatedArray([], 1).size(), 0);
  });

  it("rejects inconsistent repetition counts", () => {
    assert.throws(() => new RepeatedArray([one], 0), /must be repeated at least once/);
    assert.throws(() => new RepeatedArray([], 2), /cannot be repeated more than once/);
    assert.throws(() => new RepeatedArray([one], -1), /Invalid repetition count -1/);
    assert.throws(() => new RepeatedArray([one], 1.5), /Invalid repetition count 1.5/);
  });
});

describe("Analyzed", () => {
  it("counts array elements per polynomial type", () => {
    const analyzed = program();
    assert.equal(analyzed.commitmentCount(), 4);
    assert.equal(analyzed.constantCount(), 1);
    assert.equal(analyzed.intermediateCount(), 1);
  });

  it("lists definitions in source order, not map order", () => {
    const analyzed = program();
    assert.deepEqual(analyzed.committedPolysInSourceOrder().map(([p]) => p.absoluteName), ["Main.a", "Main.c"]);
    assert.deepEqual(analyzed.constantPolysInSourceOrder().map(([p]) => p.absoluteName), ["Main.b"]);
    assert.deepEqual(analyzed.definitionsInSourceOrder("Intermediate").map(([p]) => p.absoluteName), ["Main.s"]);
  });

  it("looks up polynomials by absolute name", () => {
    const analyzed = program();
    const a = analyzed.polynomial("Main.a");
    assert.ok(a);
    assert.equal(isArray(a), true);
    assert.equal(analyzed.polynomial("a"), undefined);
  });

  it("rejects a source order naming an unknown definition", () => {
    assert.throws(
      () => new Analyzed({
        constants: new Map(),
        definitions: new Map(),
        publicDeclarations: new Map(),
        identities: [],
        sourceOrder: [{ kind: "Definition", name: "Main.z" }],
      }),
      /unknown definition 'Main.z'/
    );
  });

  it("does not share its collections with the caller", () => {
    const definitions = new Map<string, Definition>();
    const analyzed = new Analyzed({
      constants: new Map(),
      definitions,
      publicDeclarations: new Map(),
      identities: [],
      sourceOrder: [],
    });
    definitions.set("Main.x", [poly(0, "Main.x", "Committed"), undefined]);
    assert.equal(analyzed.definitions.size, 0);
  });
});
