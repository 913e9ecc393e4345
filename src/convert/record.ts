import type { TypeDesc } from "../desc/desc";
import { showDesc } from "../desc/show";
import type { DestRecord } from "../dest/types";
import { ConversionError } from "../outcome/errors";
import { invalidLayout, kindMismatch, missingField } from "../outcome/constructors";
import { within, type BuildContext, type ConvFn } from "./types";

/**
 * How one destination field is filled: where its source bytes are, where
 * its destination bytes go, and the conversion between them.
 */
export interface FieldConv {
  readonly name: string;
  readonly srcOffset: number;
  readonly dstOffset: number;
  readonly convert: ConvFn;
}

/**
 * Resolve every destination field against the source struct by name.
 * Entries come back in destination field order. Any missing or
 * unconvertible field aborts the whole plan.
 */
export function planRecord(dest: DestRecord<unknown>, desc: TypeDesc, ctx: BuildContext): FieldConv[] {
  if (desc.tag !== "struct") {
    throw new ConversionError(kindMismatch(dest.name, showDesc(desc), ctx.path));
  }

  const plan = dest.fields.map((field): FieldConv => {
    if (field.offset < 0 || field.offset + field.type.size > dest.size) {
      throw new ConversionError(invalidLayout(field.name, dest.size, ctx.path));
    }
    const srcField = desc.fields.find((f) => f.name === field.name);
    if (!srcField) {
      throw new ConversionError(missingField(field.name, ctx.path));
    }
    return {
      name: field.name,
      srcOffset: srcField.offset,
      dstOffset: field.offset,
      convert: within(ctx, field.name, (inner) => inner.build(field.type, srcField.type, inner)),
    };
  });

  const wanted = new Set(dest.fields.map((f) => f.name));
  for (const f of desc.fields) {
    if (!wanted.has(f.name)) {
      ctx.trace.emit({ tag: "E_FieldIgnored", path: [...ctx.path], field: f.name });
    }
  }

  return plan;
}

export function buildRecord(dest: DestRecord<unknown>, desc: TypeDesc, ctx: BuildContext): ConvFn {
  const plan = planRecord(dest, desc, ctx);
  return (src, s, dst, d) => {
    for (const f of plan) {
      f.convert(src, s + f.srcOffset, dst, d + f.dstOffset);
    }
  };
}
