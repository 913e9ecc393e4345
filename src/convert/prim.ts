import type { PrimName, TypeDesc } from "../desc/desc";
import { isPrimName } from "../desc/desc";
import { showDesc } from "../desc/show";
import type { DestPrim } from "../dest/types";
import { ConversionError } from "../outcome/errors";
import { kindMismatch, noConversionPath } from "../outcome/constructors";
import type { BuildContext, ConvFn } from "./types";

type SourceReader = (view: DataView, offset: number, le: boolean) => number | bigint;

// How each source primitive is read before widening; char, short, int and long are signed.
const READERS: Record<PrimName, SourceReader> = {
  unit: () => 0,
  bool: (v, o) => v.getUint8(o),
  char: (v, o) => v.getInt8(o),
  byte: (v, o) => v.getUint8(o),
  short: (v, o, le) => v.getInt16(o, le),
  int: (v, o, le) => v.getInt32(o, le),
  long: (v, o, le) => v.getBigInt64(o, le),
  float: (v, o, le) => v.getFloat32(o, le),
  double: (v, o, le) => v.getFloat64(o, le),
};

/**
 * Bit-for-bit copy of `size` bytes. Source and destination are read and
 * written with the same byte order, so the order chosen here is irrelevant.
 */
function copier(size: number): ConvFn {
  switch (size) {
    case 0:
      return () => {};
    case 1:
      return (src, s, dst, d) => dst.setUint8(d, src.getUint8(s));
    case 2:
      return (src, s, dst, d) => dst.setUint16(d, src.getUint16(s));
    case 4:
      return (src, s, dst, d) => dst.setUint32(d, src.getUint32(s));
    case 8:
      return (src, s, dst, d) => dst.setBigUint64(d, src.getBigUint64(s));
    default:
      return (src, s, dst, d) => {
        for (let i = 0; i < size; i++) dst.setUint8(d + i, src.getUint8(s + i));
      };
  }
}

export function buildPrim(dest: DestPrim<unknown>, desc: TypeDesc, ctx: BuildContext): ConvFn {
  if (desc.tag !== "prim") {
    throw new ConversionError(kindMismatch(dest.name, showDesc(desc), ctx.path));
  }

  if (desc.name === dest.source) {
    return copier(dest.size);
  }

  const name = desc.name;
  if (isPrimName(name) && dest.widensFrom.includes(name)) {
    const read = READERS[name];
    const store = dest.store;
    const le = ctx.config.littleEndian;
    return (src, s, dst, d) => store(dst, d, read(src, s, le), le);
  }

  throw new ConversionError(noConversionPath(name, dest.name, ctx.path));
}
