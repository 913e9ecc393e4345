import type { TypeDesc, Variant } from "./desc";
import { ConversionError } from "../outcome/errors";
import { invalidDescriptor, kindMismatch } from "../outcome/constructors";

/** Width of the u32 tag that leads every variant */
export const TAG_SIZE = 4;

const PRIM_SIZES: Record<string, number> = {
  unit: 0,
  bool: 1,
  char: 1,
  byte: 1,
  short: 2,
  int: 4,
  long: 8,
  float: 4,
  double: 8,
};

export function alignTo(offset: number, align: number): number {
  return align <= 1 ? offset : Math.ceil(offset / align) * align;
}

function primSize(name: string): number {
  const size = PRIM_SIZES[name];
  if (size === undefined) {
    throw new ConversionError(invalidDescriptor(`unknown primitive '${name}'`));
  }
  return size;
}

function arrayLength(len: TypeDesc): number {
  if (len.tag !== "nat") {
    throw new ConversionError(kindMismatch("size", len.tag));
  }
  return len.value;
}

export function alignOf(t: TypeDesc): number {
  switch (t.tag) {
    case "prim":
      return Math.max(primSize(t.name), 1);
    case "nat":
      throw new ConversionError(kindMismatch("type", "size"));
    case "farr":
      return alignOf(t.elem);
    case "struct":
      return t.fields.reduce((a, f) => Math.max(a, alignOf(f.type)), 1);
    case "variant":
      return t.ctors.reduce((a, c) => Math.max(a, alignOf(c.type)), TAG_SIZE);
  }
}

export function sizeOf(t: TypeDesc): number {
  switch (t.tag) {
    case "prim":
      return primSize(t.name);
    case "nat":
      throw new ConversionError(kindMismatch("type", "size"));
    case "farr":
      return arrayLength(t.len) * sizeOf(t.elem);
    case "struct": {
      const end = t.fields.reduce((e, f) => Math.max(e, f.offset + sizeOf(f.type)), 0);
      return alignTo(end, alignOf(t));
    }
    case "variant": {
      const payload = t.ctors.reduce((m, c) => Math.max(m, sizeOf(c.type)), 0);
      return alignTo(variantPayloadOffset(t) + payload, alignOf(t));
    }
  }
}

/**
 * Offset of the payload shared by every constructor of a variant.
 */
export function variantPayloadOffset(t: Variant): number {
  const maxAlign = t.ctors.reduce((a, c) => Math.max(a, alignOf(c.type)), 1);
  return alignTo(TAG_SIZE, maxAlign);
}
