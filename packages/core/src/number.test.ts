import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { FieldElement, MODULUS } from "./number.js";

const f = (v: number | bigint) => FieldElement.from(v);

describe("FieldElement", () => {
  it("reduces into the canonical range", () => {
    assert.equal(f(MODULUS).toBigInt(), 0n);
    assert.equal(f(MODULUS + 5n).toBigInt(), 5n);
    assert.equal(f(-1).toBigInt(), MODULUS - 1n);
  });

  it("parses decimal, hex and negated literals", () => {
    assert.equal(FieldElement.parse("42").toBigInt(), 42n);
    assert.equal(FieldElement.parse(" 0xff ").toBigInt(), 255n);
    assert.equal(FieldElement.parse("-2").toBigInt(), MODULUS - 2n);
    assert.throws(() => FieldElement.parse("1.5"), /Invalid number literal: '1.5'/);
  });

  it("adds, subtracts and multiplies modulo the prime", () => {
    assert.equal(f(MODULUS - 1n).add(f(2)).toBigInt(), 1n);
    assert.equal(f(3).sub(f(5)).toBigInt(), MODULUS - 2n);
    assert.equal(f(1n << 32n).mul(f(1n << 32n)).toBigInt(), (1n << 32n) - 1n);
    assert.equal(f(7).neg().add(f(7)).isZero(), true);
  });

  it("raises to powers", () => {
    assert.equal(f(2).pow(10n).toBigInt(), 1024n);
    assert.equal(f(5).pow(0n).toBigInt(), 1n);
    assert.equal(f(2).pow(-1n).mul(f(2)).toBigInt(), 1n);
  });

  it("divides through the inverse", () => {
    assert.equal(f(10).div(f(5)).toBigInt(), 2n);
    assert.equal(f(1).div(f(2)).mul(f(2)).toBigInt(), 1n);
    assert.throws(() => f(1).div(FieldElement.ZERO), /Division by zero in field/);
  });

  it("applies integer operations to the representative", () => {
    assert.equal(f(0b1100).and(f(0b1010)).toBigInt(), 0b1000n);
    assert.equal(f(0b1100).or(f(0b1010)).toBigInt(), 0b1110n);
    assert.equal(f(0b1100).xor(f(0b1010)).toBigInt(), 0b0110n);
    assert.equal(f(1).shl(f(4)).toBigInt(), 16n);
    assert.equal(f(256).shr(f(4)).toBigInt(), 16n);
    assert.equal(f(17).mod(f(5)).toBigInt(), 2n);
    assert.throws(() => f(1).mod(FieldElement.ZERO), /Modulo by zero/);
  });

  it("keeps bitwise results inside the field", () => {
    assert.equal(f(MODULUS - 1n).or(f(0xffffffffn)).toBigInt(), (1n << 64n) - 1n - MODULUS);
  });

  it("converts to row indices", () => {
    assert.equal(f(12).toDegree(), 12);
    assert.throws(() => f(-1).toDegree(), /does not fit a row index/);
  });

  it("compares by value", () => {
    assert.equal(f(MODULUS + 3n).equals(f(3)), true);
    assert.equal(f(3).toString(), "3");
  });
});
