import type { PrimName } from "../desc/desc";

/**
 * Destination types describe a statically known layout and the JS value it
 * decodes to. The engine only relies on this reflection surface, so any
 * object satisfying it can act as a destination.
 */
interface DestBase<T> {
  readonly kind: DestKind;
  /** Display name used in messages */
  readonly name: string;
  readonly size: number;
  readonly align: number;
  read(view: DataView, offset: number, littleEndian?: boolean): T;
}

export type DestKind = "prim" | "array" | "record" | "variant";

export interface DestPrim<T> extends DestBase<T> {
  readonly kind: "prim";
  /** Source primitive name accepted as an identity copy */
  readonly source: PrimName;
  /** Narrower source primitives this type widens from */
  readonly widensFrom: readonly PrimName[];
  store(view: DataView, offset: number, value: number | bigint, littleEndian: boolean): void;
}

export interface DestArray<T> extends DestBase<T> {
  readonly kind: "array";
  readonly elem: DestType;
  readonly length: number;
}

export interface DestField {
  readonly name: string;
  readonly offset: number;
  readonly type: DestType;
}

export interface DestRecord<T> extends DestBase<T> {
  readonly kind: "record";
  readonly fields: readonly DestField[];
}

export interface DestCtor {
  readonly name: string;
  /** Tag value written into the destination when this constructor is chosen */
  readonly id: number;
  readonly type: DestType;
}

export interface DestVariant<T> extends DestBase<T> {
  readonly kind: "variant";
  readonly ctors: readonly DestCtor[];
  readonly payloadOffset: number;
  writeTag(view: DataView, offset: number, id: number, littleEndian: boolean): void;
}

export type DestType<T = unknown> = DestPrim<T> | DestArray<T> | DestRecord<T> | DestVariant<T>;

/** The JS value a destination type decodes to */
export type InferDest<D> = D extends { read(view: DataView, offset: number, littleEndian?: boolean): infer T } ? T : never;

/**
 * Zeroed destination memory for one value of `dest`.
 */
export function alloc(dest: DestType): DataView {
  return new DataView(new ArrayBuffer(dest.size));
}
