export * from "./prim";
export { array, record, variant, type RecordShape, type RecordValue, type VariantValue } from "./compound";
export {
  alloc,
  type DestArray,
  type DestCtor,
  type DestField,
  type DestKind,
  type DestPrim,
  type DestRecord,
  type DestType,
  type DestVariant,
  type InferDest,
} from "./types";
