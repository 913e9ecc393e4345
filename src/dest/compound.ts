import { alignTo, TAG_SIZE } from "../desc/layout";
import { ConversionError } from "../outcome/errors";
import { unknownTag } from "../outcome/constructors";
import type { DestArray, DestCtor, DestField, DestRecord, DestType, DestVariant, InferDest } from "./types";

export type RecordShape = Record<string, DestType>;

export type RecordValue<S extends RecordShape> = { [K in keyof S]: InferDest<S[K]> };

export type VariantValue<S extends RecordShape> = {
  [K in keyof S & string]: { tag: K; value: InferDest<S[K]> };
}[keyof S & string];

export function array<D extends DestType>(elem: D, length: number): DestArray<Array<InferDest<D>>> {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`array length must be a non-negative integer, got ${length}`);
  }
  return {
    kind: "array",
    name: `${elem.name}[${length}]`,
    elem,
    length,
    size: elem.size * length,
    align: elem.align,
    read(view, offset, littleEndian = true) {
      const out: Array<InferDest<D>> = [];
      for (let i = 0; i < length; i++) {
        // D is the element type itself, so its reading is InferDest<D>
        out.push(elem.read(view, offset + i * elem.size, littleEndian) as InferDest<D>);
      }
      return out;
    },
  };
}

/**
 * Record with C layout, fields in the key order of `shape`.
 * Integer-like keys are enumerated first by JS, so avoid them as field names.
 */
export function record<S extends RecordShape>(shape: S): DestRecord<RecordValue<S>> {
  let offset = 0;
  let align = 1;
  const fields: DestField[] = [];
  for (const [name, type] of Object.entries(shape)) {
    offset = alignTo(offset, type.align);
    fields.push({ name, offset, type });
    offset += type.size;
    align = Math.max(align, type.align);
  }

  return {
    kind: "record",
    name: `{${fields.map((f) => `${f.name}: ${f.type.name}`).join(", ")}}`,
    fields,
    size: alignTo(offset, align),
    align,
    read(view, offset, littleEndian = true) {
      const out: Record<string, unknown> = {};
      for (const f of fields) {
        out[f.name] = f.type.read(view, offset + f.offset, littleEndian);
      }
      // every key of S was filled from its own field type
      return out as RecordValue<S>;
    },
  };
}

/**
 * Tagged union: a u32 tag at offset 0, then one payload slot shared by all
 * constructors. Tag values default to declaration index and must be
 * distinct u32 values.
 */
export function variant<S extends RecordShape>(
  shape: S,
  ids: Readonly<Record<string, number>> = {}
): DestVariant<VariantValue<S>> {
  const ctors: DestCtor[] = Object.entries(shape).map(([name, type], i) => ({
    name,
    id: ids[name] ?? i,
    type,
  }));
  const maxAlign = ctors.reduce((a, c) => Math.max(a, c.type.align), 1);
  const payloadOffset = alignTo(TAG_SIZE, maxAlign);
  const payloadSize = ctors.reduce((m, c) => Math.max(m, c.type.size), 0);
  const align = Math.max(TAG_SIZE, maxAlign);
  const byId = new Map<number, DestCtor>();
  for (const c of ctors) {
    if (!Number.isInteger(c.id) || c.id < 0 || c.id > 0xffffffff) {
      throw new RangeError(`variant tag of ${c.name} must be a u32, got ${c.id}`);
    }
    const taken = byId.get(c.id);
    if (taken) {
      throw new RangeError(`variant tag ${c.id} is used by both ${taken.name} and ${c.name}`);
    }
    byId.set(c.id, c);
  }

  return {
    kind: "variant",
    name: `|${ctors.map((c) => `${c.name}: ${c.type.name}`).join(", ")}|`,
    ctors,
    payloadOffset,
    size: alignTo(payloadOffset + payloadSize, align),
    align,
    writeTag(view, offset, id, littleEndian) {
      view.setUint32(offset, id, littleEndian);
    },
    read(view, offset, littleEndian = true) {
      const tag = view.getUint32(offset, littleEndian);
      const ctor = byId.get(tag);
      if (!ctor) {
        throw new ConversionError(unknownTag(tag));
      }
      const value = ctor.type.read(view, offset + payloadOffset, littleEndian);
      // the constructor's name and payload come from the same shape entry
      return { tag: ctor.name, value } as VariantValue<S>;
    },
  };
}
