import type { TypeDesc } from "../desc/desc";
import { alignOf, alignTo, sizeOf, TAG_SIZE } from "../desc/layout";
import type { DestType } from "../dest/types";

/**
 * Bytes past the start of a source value that a converter from `desc` into
 * `dest` actually reads. Source fields and constructors the destination
 * does not name are never read, so they are never sized either.
 *
 * Only meaningful for a pair that has already built.
 */
export function sourceExtent(dest: DestType, desc: TypeDesc): number {
  switch (dest.kind) {
    case "prim":
      return sizeOf(desc);
    case "array":
      return desc.tag === "farr" ? dest.length * sizeOf(desc.elem) : 0;
    case "record": {
      if (desc.tag !== "struct") return 0;
      let end = 0;
      for (const field of dest.fields) {
        const src = desc.fields.find((f) => f.name === field.name);
        if (src) {
          end = Math.max(end, src.offset + sourceExtent(field.type, src.type));
        }
      }
      return end;
    }
    case "variant": {
      if (desc.tag !== "variant") return 0;
      let maxAlign = 1;
      let payload = 0;
      for (const ctor of dest.ctors) {
        const src = desc.ctors.find((c) => c.name === ctor.name);
        if (src) {
          maxAlign = Math.max(maxAlign, alignOf(src.type));
          payload = Math.max(payload, sourceExtent(ctor.type, src.type));
        }
      }
      return Math.max(TAG_SIZE, alignTo(TAG_SIZE, maxAlign) + payload);
    }
  }
}
