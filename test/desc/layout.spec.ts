import { describe, it, expect } from "vitest";
import { farr, nat, prim, struct, structOf, variant } from "../../src/desc/desc";
import { alignOf, alignTo, sizeOf, variantPayloadOffset } from "../../src/desc/layout";
import { showDesc } from "../../src/desc/show";
import { conversionError } from "../helpers/bytes";

const int = prim("int");
const double = prim("double");

describe("descriptor layout", () => {
  it("rounds offsets up to an alignment", () => {
    expect(alignTo(5, 4)).toBe(8);
    expect(alignTo(8, 8)).toBe(8);
    expect(alignTo(5, 1)).toBe(5);
    expect(alignTo(0, 8)).toBe(0);
  });

  it("knows primitive sizes and alignments", () => {
    expect(sizeOf(prim("unit"))).toBe(0);
    expect(alignOf(prim("unit"))).toBe(1);
    expect(sizeOf(prim("char"))).toBe(1);
    expect(sizeOf(prim("short"))).toBe(2);
    expect(sizeOf(int)).toBe(4);
    expect(sizeOf(prim("long"))).toBe(8);
    expect(alignOf(double)).toBe(8);
  });

  it("lays out structs with C padding", () => {
    const s = structOf([["a", prim("char")], ["b", int], ["c", prim("short")]]);
    expect(s.fields.map((f) => f.offset)).toEqual([0, 4, 8]);
    expect(alignOf(s)).toBe(4);
    expect(sizeOf(s)).toBe(12);
  });

  it("sizes structs with explicit offsets from their furthest field", () => {
    const s = struct([
      { name: "b", offset: 8, type: int },
      { name: "a", offset: 0, type: prim("byte") },
    ]);
    expect(sizeOf(s)).toBe(12);
    expect(sizeOf(struct([]))).toBe(0);
  });

  it("sizes fixed arrays as length times element size", () => {
    expect(sizeOf(farr(double, 3))).toBe(24);
    expect(alignOf(farr(double, 3))).toBe(8);
    expect(sizeOf(farr(structOf([["x", prim("short")], ["y", prim("byte")]]), 2))).toBe(8);
  });

  it("places the variant payload after the tag at the widest alignment", () => {
    const v = variant([["A", prim("byte")], ["B", int], ["C", double]]);
    expect(variantPayloadOffset(v)).toBe(8);
    expect(alignOf(v)).toBe(8);
    expect(sizeOf(v)).toBe(16);

    const narrow = variant([["A", prim("byte")]]);
    expect(variantPayloadOffset(narrow)).toBe(4);
    expect(alignOf(narrow)).toBe(4);
    expect(sizeOf(narrow)).toBe(8);
  });

  it("numbers variant constructors by declaration unless given ids", () => {
    const v = variant([["A", int], { name: "B", id: 42, type: double }]);
    expect(v.ctors.map((c) => c.id)).toEqual([0, 42]);
  });

  it("rejects sizes of non-types and unknown primitives", () => {
    expect(conversionError(() => sizeOf(nat(3))).reason).toBe("kind-mismatch");
    expect(conversionError(() => sizeOf(farr(int, int))).reason).toBe("kind-mismatch");
    expect(conversionError(() => sizeOf(prim("quad"))).reason).toBe("invalid-descriptor");
  });
});

describe("showDesc", () => {
  it("renders every node kind", () => {
    expect(showDesc(int)).toBe("int");
    expect(showDesc(farr(int, 3))).toBe("[int:3]");
    expect(showDesc(structOf([["a", int], ["b", double]]))).toBe("{a:int@0, b:double@8}");
    expect(showDesc(variant([["Left", int], ["Right", double]]))).toBe("|Left:int=0, Right:double=1|");
  });
});
