import { alignOf, alignTo, sizeOf } from "./layout";

// Leaf nodes
export interface Prim { readonly tag: "prim"; readonly name: string }
export interface Nat { readonly tag: "nat"; readonly value: number }

// Compound nodes
export interface FArr { readonly tag: "farr"; readonly elem: TypeDesc; readonly len: TypeDesc }

export interface StructField {
  readonly name: string;
  readonly offset: number;
  readonly type: TypeDesc;
}
export interface Struct { readonly tag: "struct"; readonly fields: readonly StructField[] }

export interface VariantCtor {
  readonly name: string;
  readonly id: number;
  readonly type: TypeDesc;
}
export interface Variant { readonly tag: "variant"; readonly ctors: readonly VariantCtor[] }

export type TypeDesc = Prim | Nat | FArr | Struct | Variant;
export type DescTag = TypeDesc["tag"];

/** Primitive names with a known size */
export const PRIM_NAMES = ["unit", "bool", "char", "byte", "short", "int", "long", "float", "double"] as const;
export type PrimName = (typeof PRIM_NAMES)[number];

export function prim(name: string): Prim {
  return { tag: "prim", name };
}

export function nat(value: number): Nat {
  return { tag: "nat", value };
}

export function farr(elem: TypeDesc, len: number | TypeDesc): FArr {
  return { tag: "farr", elem, len: typeof len === "number" ? nat(len) : len };
}

export function struct(fields: readonly StructField[]): Struct {
  return { tag: "struct", fields };
}

/**
 * Struct with C layout: each field at the next offset aligned for its type.
 */
export function structOf(fields: ReadonlyArray<readonly [string, TypeDesc]>): Struct {
  let offset = 0;
  const laid: StructField[] = [];
  for (const [name, type] of fields) {
    offset = alignTo(offset, alignOf(type));
    laid.push({ name, offset, type });
    offset += sizeOf(type);
  }
  return struct(laid);
}

/**
 * Variant from constructors; a bare [name, type] pair takes its declaration index as id.
 */
export function variant(
  ctors: ReadonlyArray<readonly [string, TypeDesc] | VariantCtor>
): Variant {
  return {
    tag: "variant",
    ctors: ctors.map((c, i) => ("name" in c ? c : { name: c[0], id: i, type: c[1] })),
  };
}

export function isPrimName(name: string): name is PrimName {
  return PRIM_NAMES.some((n) => n === name);
}
