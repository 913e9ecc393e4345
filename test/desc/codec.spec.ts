import { describe, it, expect } from "vitest";
import { farr, prim, structOf, variant } from "../../src/desc/desc";
import { decodeDesc, encodeDesc } from "../../src/desc/codec";
import { conversionError } from "../helpers/bytes";

const decodeError = (json: string) => conversionError(() => decodeDesc(json));

describe("descriptor codec", () => {
  it("encodes with sorted keys", () => {
    expect(encodeDesc(prim("int"))).toBe('{"name":"int","tag":"prim"}');
    expect(encodeDesc(farr(prim("int"), 2))).toBe(
      '{"elem":{"name":"int","tag":"prim"},"len":{"tag":"nat","value":2},"tag":"farr"}'
    );
  });

  it("encodes structurally equal descriptors identically", () => {
    const a = structOf([["x", prim("int")], ["y", prim("double")]]);
    const b = { tag: "struct" as const, fields: [
      { type: prim("int"), offset: 0, name: "x" },
      { type: prim("double"), name: "y", offset: 8 },
    ] };
    expect(encodeDesc(a)).toBe(encodeDesc(b));
  });

  it("decodes what it encodes", () => {
    const desc = structOf([
      ["id", prim("long")],
      ["tags", farr(prim("byte"), 4)],
      ["shape", variant([["Circle", prim("double")], ["Dot", prim("unit")]])],
    ]);
    expect(decodeDesc(encodeDesc(desc))).toEqual(desc);
  });

  it("rejects malformed input with its location", () => {
    expect(decodeError("nope").reason).toBe("invalid-descriptor");
    expect(decodeError('{"tag":"nat","value":-1}').message).toBe(
      "Invalid type descriptor: $.value must be a non-negative integer"
    );
    expect(decodeError('{"tag":"tuple"}').message).toBe('Invalid type descriptor: $: unknown tag "tuple"');
    expect(decodeError('{"tag":"struct","fields":[{"name":"a","offset":0}]}').message).toBe(
      "Invalid type descriptor: $.fields[0].type: expected object"
    );
    expect(decodeError('{"tag":"variant","ctors":{}}').message).toBe(
      "Invalid type descriptor: $.ctors must be an array"
    );
  });

  it("rejects constructor ids wider than 32 bits", () => {
    const json = JSON.stringify({ tag: "variant", ctors: [{ name: "A", id: 2 ** 32, type: prim("int") }] });
    expect(decodeError(json).message).toBe("Invalid type descriptor: $.ctors[0].id does not fit in 32 bits");
  });
});
