import { describe, it, expect } from "vitest";
import { prim, struct, structOf } from "../../src/desc/desc";
import { DEFAULT_CONFIG } from "../../src/config/config";
import { buildConv, into } from "../../src/convert/into";
import { planRecord } from "../../src/convert/record";
import type { BuildContext } from "../../src/convert/types";
import * as t from "../../src/dest/index";
import type { DestRecord } from "../../src/dest/types";
import { rootCause } from "../../src/outcome/failure";
import { memorySink, nullSink } from "../../src/ports/trace";
import { bytes, conversionError } from "../helpers/bytes";

const int = prim("int");
const abc = structOf([["a", int], ["b", int], ["c", int]]);
const abcBytes = bytes(12, (v) => {
  v.setInt32(0, 1, true);
  v.setInt32(4, 2, true);
  v.setInt32(8, 3, true);
});

const ctx: BuildContext = { config: DEFAULT_CONFIG, trace: nullSink, path: [], build: buildConv };

describe("record conversion", () => {
  it("converts a narrower view of the source", () => {
    const conv = into(t.record({ a: t.int32, c: t.int32 }), abc);
    expect(conv.convert(abcBytes)).toEqual({ a: 1, c: 3 });
  });

  it("plans fields in destination order and never touches extra source fields", () => {
    const plan = planRecord(t.record({ a: t.int32, c: t.int32 }), abc, ctx);
    expect(plan.map((f) => [f.name, f.srcOffset, f.dstOffset])).toEqual([
      ["a", 0, 0],
      ["c", 8, 4],
    ]);
  });

  it("reports ignored source fields", () => {
    const trace = memorySink();
    into(t.record({ a: t.int32, c: t.int32 }), abc, { trace });
    expect(trace.events.filter((e) => e.tag === "E_FieldIgnored")).toEqual([
      { tag: "E_FieldIgnored", path: [], field: "b" },
    ]);
  });

  it("never sizes source fields the destination leaves out", () => {
    const src = struct([
      { name: "a", offset: 0, type: int },
      { name: "s", offset: 8, type: prim("string") },
    ]);
    const conv = into(t.record({ a: t.int32 }), src);
    expect(conv.sourceSize).toBe(4);
    expect(conv.convert(bytes(4, (v) => v.setInt32(0, 77, true)))).toEqual({ a: 77 });
  });

  it("follows destination order when it differs from the source", () => {
    const conv = into(t.record({ c: t.int64, a: t.double }), abc);
    expect(conv.convert(abcBytes)).toEqual({ c: 3n, a: 1 });
  });

  it("fails the whole record on a missing field", () => {
    const e = conversionError(() => into(t.record({ a: t.int32, d: t.int32 }), abc));
    expect(e.reason).toBe("missing-field");
    expect(e.message).toBe("The field 'd' is not defined");
    expect(e.failure.context).toEqual({ field: "d" });
  });

  it("locates failures inside nested records", () => {
    const src = structOf([["inner", structOf([["x", int], ["y", int]])]]);
    const dest = t.record({ inner: t.record({ x: t.int32, z: t.int32 }) });
    const e = conversionError(() => into(dest, src));
    expect(e.reason).toBe("missing-field");
    expect(e.message).toBe("inner: The field 'z' is not defined");
    expect(e.failure.context?.path).toEqual(["inner"]);
    expect(rootCause(e.failure).message).toBe("The field 'z' is not defined");
    expect(e.failure.diagnostics[0].path).toEqual(["inner"]);
  });

  it("rejects a non-struct source", () => {
    expect(conversionError(() => into(t.record({ a: t.int32 }), int)).reason).toBe("kind-mismatch");
  });

  it("rejects a destination field that overruns its record", () => {
    const bad: DestRecord<unknown> = {
      kind: "record",
      name: "bad",
      size: 4,
      align: 4,
      fields: [{ name: "a", offset: 2, type: t.int32 }],
      read: () => undefined,
    };
    expect(conversionError(() => into(bad, structOf([["a", int]]))).reason).toBe("invalid-layout");
  });
});
