import { describe, it, expect } from "vitest";
import * as t from "../../src/dest/index";
import { ConversionError } from "../../src/outcome/errors";

describe("destination types", () => {
  it("describes primitives and their identity source names", () => {
    expect(t.int16.size).toBe(2);
    expect(t.uint16.source).toBe("short");
    expect(t.uint64.source).toBe("long");
    expect(t.unit.size).toBe(0);
    expect(t.unit.align).toBe(1);
    expect(t.double.widensFrom).toEqual(["char", "byte", "short", "int", "long", "float"]);
    expect(t.bool.widensFrom).toEqual([]);
  });

  it("lays out records in declaration order with padding", () => {
    const R = t.record({ a: t.int32, b: t.double, c: t.byte });
    expect(R.fields.map((f) => [f.name, f.offset])).toEqual([["a", 0], ["b", 8], ["c", 16]]);
    expect(R.size).toBe(24);
    expect(R.align).toBe(8);
    expect(R.name).toBe("{a: int32, b: double, c: byte}");
  });

  it("lays out fixed arrays", () => {
    const A = t.array(t.int16, 3);
    expect(A.size).toBe(6);
    expect(A.align).toBe(2);
    expect(A.name).toBe("int16[3]");
    expect(() => t.array(t.int16, -1)).toThrow(RangeError);
  });

  it("lays out variants with a shared payload slot", () => {
    const V = t.variant({ Left: t.int32, Right: t.double, Extra: t.byte });
    expect(V.ctors.map((c) => [c.name, c.id])).toEqual([["Left", 0], ["Right", 1], ["Extra", 2]]);
    expect(V.payloadOffset).toBe(8);
    expect(V.size).toBe(16);
    expect(V.align).toBe(8);

    const E = t.variant({ A: t.unit, B: t.int32 }, { B: 7 });
    expect(E.ctors.map((c) => c.id)).toEqual([0, 7]);
    expect(E.payloadOffset).toBe(4);
    expect(E.size).toBe(8);
  });

  it("rejects shared and out-of-range variant tags", () => {
    expect(() => t.variant({ A: t.int32, B: t.double }, { A: 1 })).toThrow(
      "variant tag 1 is used by both A and B"
    );
    expect(() => t.variant({ A: t.int32 }, { A: -1 })).toThrow("variant tag of A must be a u32, got -1");
    expect(() => t.variant({ A: t.int32 }, { A: 2 ** 32 })).toThrow(RangeError);
    expect(() => t.variant({ A: t.int32 }, { A: 0.5 })).toThrow(RangeError);
    expect(t.variant({ A: t.int32 }, { A: 0xffffffff }).ctors[0].id).toBe(0xffffffff);
  });

  it("reads values out of destination memory", () => {
    const R = t.record({ n: t.int64, flags: t.array(t.bool, 2), v: t.variant({ I: t.int32, F: t.float }) });
    const view = t.alloc(R);
    expect(view.byteLength).toBe(R.size);

    view.setBigInt64(0, -9n, true);
    view.setUint8(8, 1);
    const vOffset = R.fields[2].offset;
    view.setUint32(vOffset, 1, true);
    view.setFloat32(vOffset + 4, 0.5, true);

    expect(R.read(view, 0)).toEqual({ n: -9n, flags: [true, false], v: { tag: "F", value: 0.5 } });
  });

  it("refuses to read a variant tag it does not declare", () => {
    const V = t.variant({ A: t.int32 });
    const view = t.alloc(V);
    view.setUint32(0, 3, true);
    expect(() => V.read(view, 0)).toThrow(ConversionError);
  });
});
