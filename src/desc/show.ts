import type { TypeDesc } from "./desc";

/**
 * Render a descriptor for messages.
 *
 *   int                          primitive
 *   [int:3]                      fixed array
 *   {a:int@0, b:double@8}        struct with source offsets
 *   |Left:int=0, Right:double=1| variant with source tags
 */
export function showDesc(t: TypeDesc): string {
  switch (t.tag) {
    case "prim":
      return t.name;
    case "nat":
      return String(t.value);
    case "farr":
      return `[${showDesc(t.elem)}:${showDesc(t.len)}]`;
    case "struct":
      return `{${t.fields.map((f) => `${f.name}:${showDesc(f.type)}@${f.offset}`).join(", ")}}`;
    case "variant":
      return `|${t.ctors.map((c) => `${c.name}:${showDesc(c.type)}=${c.id}`).join(", ")}|`;
  }
}
