import type { PrimName } from "../desc/desc";
import type { DestPrim } from "./types";

type Reader<T> = (view: DataView, offset: number, le: boolean) => T;
type Storer = (view: DataView, offset: number, value: number | bigint, le: boolean) => void;

function primType<T>(
  name: string,
  source: PrimName,
  size: number,
  widensFrom: readonly PrimName[],
  read: Reader<T>,
  store: Storer
): DestPrim<T> {
  return {
    kind: "prim",
    name,
    source,
    size,
    align: Math.max(size, 1),
    widensFrom,
    read: (view, offset, littleEndian = true) => read(view, offset, littleEndian),
    store,
  };
}

const toBig = (v: number | bigint): bigint => (typeof v === "bigint" ? v : BigInt(v));

// Each type accepts identity plus the narrower names listed.
const SMALL: readonly PrimName[] = ["char", "byte"];
const INT: readonly PrimName[] = ["char", "byte", "short"];
const LONG: readonly PrimName[] = ["char", "byte", "short", "int"];

export const unit = primType<undefined>("unit", "unit", 0, [], () => undefined, () => {});

export const bool = primType<boolean>(
  "bool", "bool", 1, [],
  (v, o) => v.getUint8(o) !== 0,
  (v, o, x) => v.setUint8(o, Number(x))
);

export const char = primType<number>(
  "char", "char", 1, [],
  (v, o) => v.getInt8(o),
  (v, o, x) => v.setInt8(o, Number(x))
);

export const byte = primType<number>(
  "byte", "byte", 1, ["char"],
  (v, o) => v.getUint8(o),
  (v, o, x) => v.setUint8(o, Number(x))
);

export const int16 = primType<number>(
  "int16", "short", 2, SMALL,
  (v, o, le) => v.getInt16(o, le),
  (v, o, x, le) => v.setInt16(o, Number(x), le)
);

export const uint16 = primType<number>(
  "uint16", "short", 2, SMALL,
  (v, o, le) => v.getUint16(o, le),
  (v, o, x, le) => v.setUint16(o, Number(x), le)
);

export const int32 = primType<number>(
  "int32", "int", 4, INT,
  (v, o, le) => v.getInt32(o, le),
  (v, o, x, le) => v.setInt32(o, Number(x), le)
);

export const uint32 = primType<number>(
  "uint32", "int", 4, INT,
  (v, o, le) => v.getUint32(o, le),
  (v, o, x, le) => v.setUint32(o, Number(x), le)
);

export const int64 = primType<bigint>(
  "int64", "long", 8, LONG,
  (v, o, le) => v.getBigInt64(o, le),
  (v, o, x, le) => v.setBigInt64(o, toBig(x), le)
);

export const uint64 = primType<bigint>(
  "uint64", "long", 8, LONG,
  (v, o, le) => v.getBigUint64(o, le),
  (v, o, x, le) => v.setBigUint64(o, toBig(x), le)
);

export const float = primType<number>(
  "float", "float", 4, LONG,
  (v, o, le) => v.getFloat32(o, le),
  (v, o, x, le) => v.setFloat32(o, Number(x), le)
);

export const double = primType<number>(
  "double", "double", 8, ["char", "byte", "short", "int", "long", "float"],
  (v, o, le) => v.getFloat64(o, le),
  (v, o, x, le) => v.setFloat64(o, Number(x), le)
);
