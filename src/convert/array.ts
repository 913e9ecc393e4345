import type { TypeDesc } from "../desc/desc";
import { sizeOf } from "../desc/layout";
import { showDesc } from "../desc/show";
import type { DestArray } from "../dest/types";
import { ConversionError } from "../outcome/errors";
import { invalidLength, kindMismatch, lengthMismatch } from "../outcome/constructors";
import { within, type BuildContext, type ConvFn } from "./types";

/**
 * Fixed arrays convert when their lengths agree and their elements convert.
 */
export function buildArray(dest: DestArray<unknown>, desc: TypeDesc, ctx: BuildContext): ConvFn {
  if (desc.tag !== "farr") {
    throw new ConversionError(kindMismatch(dest.name, showDesc(desc), ctx.path));
  }

  const len = desc.len;
  if (len.tag !== "nat" || !Number.isInteger(len.value) || len.value < 0) {
    throw new ConversionError(invalidLength(showDesc(len), ctx.path));
  }
  if (len.value !== dest.length) {
    throw new ConversionError(lengthMismatch(dest.length, len.value, ctx.path));
  }

  const convElem = within(ctx, "[]", (inner) => inner.build(dest.elem, desc.elem, inner));
  const srcStep = sizeOf(desc.elem);
  const dstStep = dest.elem.size;
  const n = dest.length;

  return (src, s, dst, d) => {
    for (let i = 0; i < n; i++) {
      convElem(src, s + i * srcStep, dst, d + i * dstStep);
    }
  };
}
