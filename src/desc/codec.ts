import type { StructField, TypeDesc, VariantCtor } from "./desc";
import { ConversionError } from "../outcome/errors";
import { invalidDescriptor } from "../outcome/constructors";

/**
 * Encode a descriptor to a canonical JSON string.
 * - Object keys are sorted lexicographically
 * - Arrays (fields, constructors) preserve order
 * Two structurally equal descriptors always encode to the same string.
 */
export function encodeDesc(desc: TypeDesc): string {
  return JSON.stringify(desc, (_key, value: unknown) => {
    if (value && typeof value === "object" && !Array.isArray(value)) {
      const sorted: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[k] = v;
      }
      return sorted;
    }
    return value;
  });
}

function bad(detail: string): never {
  throw new ConversionError(invalidDescriptor(detail));
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function natural(x: unknown, what: string): number {
  if (typeof x !== "number" || !Number.isInteger(x) || x < 0) {
    bad(`${what} must be a non-negative integer`);
  }
  return x;
}

function str(x: unknown, what: string): string {
  if (typeof x !== "string") {
    bad(`${what} must be a string`);
  }
  return x;
}

function list(x: unknown, what: string): unknown[] {
  if (!Array.isArray(x)) {
    bad(`${what} must be an array`);
  }
  return x;
}

/**
 * Validate an already-parsed value as a descriptor tree.
 */
export function toDesc(node: unknown, where = "$"): TypeDesc {
  if (!isObject(node)) {
    return bad(`${where}: expected object`);
  }

  switch (node.tag) {
    case "prim":
      return { tag: "prim", name: str(node.name, `${where}.name`) };
    case "nat":
      return { tag: "nat", value: natural(node.value, `${where}.value`) };
    case "farr":
      return {
        tag: "farr",
        elem: toDesc(node.elem, `${where}.elem`),
        len: toDesc(node.len, `${where}.len`),
      };
    case "struct":
      return {
        tag: "struct",
        fields: list(node.fields, `${where}.fields`).map((f, i): StructField => {
          const at = `${where}.fields[${i}]`;
          if (!isObject(f)) return bad(`${at}: expected object`);
          return {
            name: str(f.name, `${at}.name`),
            offset: natural(f.offset, `${at}.offset`),
            type: toDesc(f.type, `${at}.type`),
          };
        }),
      };
    case "variant":
      return {
        tag: "variant",
        ctors: list(node.ctors, `${where}.ctors`).map((c, i): VariantCtor => {
          const at = `${where}.ctors[${i}]`;
          if (!isObject(c)) return bad(`${at}: expected object`);
          const id = natural(c.id, `${at}.id`);
          if (id > 0xffffffff) bad(`${at}.id does not fit in 32 bits`);
          return {
            name: str(c.name, `${at}.name`),
            id,
            type: toDesc(c.type, `${at}.type`),
          };
        }),
      };
    default:
      return bad(`${where}: unknown tag ${JSON.stringify(node.tag)}`);
  }
}

/**
 * Decode a JSON string into a descriptor, validating every node.
 */
export function decodeDesc(json: string): TypeDesc {
  let node: unknown;
  try {
    node = JSON.parse(json);
  } catch (e) {
    return bad(`not JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  return toDesc(node);
}
