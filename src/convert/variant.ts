import type { TypeDesc } from "../desc/desc";
import { alignOf, alignTo, TAG_SIZE } from "../desc/layout";
import { showDesc } from "../desc/show";
import type { DestVariant } from "../dest/types";
import { ConversionError } from "../outcome/errors";
import { invalidLayout, kindMismatch, unknownTag } from "../outcome/constructors";
import { within, type BuildContext, type ConvFn } from "./types";

/**
 * Converts the payload found at the given source offset and stamps the
 * destination tag of the matched constructor.
 */
export type CtorConv = ConvFn;

export interface VariantPlan {
  /** Keyed by source tag, not destination tag */
  readonly ctors: ReadonlyMap<number, CtorConv>;
  readonly srcPayloadOffset: number;
  readonly maxAlign: number;
}

/**
 * Match destination constructors to source constructors by name.
 *
 * Destination constructors the source lacks are skipped. A matched
 * constructor whose payload can't convert aborts the plan. The source
 * payload offset is folded over the matched payload alignments in
 * destination order; the result doesn't depend on that order.
 */
export function planVariant(dest: DestVariant<unknown>, desc: TypeDesc, ctx: BuildContext): VariantPlan {
  if (desc.tag !== "variant") {
    throw new ConversionError(kindMismatch(dest.name, showDesc(desc), ctx.path));
  }

  const ctors = new Map<number, CtorConv>();
  let maxAlign = 1;
  let srcPayloadOffset = TAG_SIZE;
  const le = ctx.config.littleEndian;
  const dstPayloadOffset = dest.payloadOffset;

  for (const ctor of dest.ctors) {
    const srcCtor = desc.ctors.find((c) => c.name === ctor.name);
    if (!srcCtor) {
      ctx.trace.emit({ tag: "E_CtorSkipped", path: [...ctx.path], ctor: ctor.name });
      continue;
    }
    if (dstPayloadOffset + ctor.type.size > dest.size) {
      throw new ConversionError(invalidLayout(ctor.name, dest.size, ctx.path));
    }

    maxAlign = Math.max(maxAlign, alignOf(srcCtor.type));
    srcPayloadOffset = alignTo(TAG_SIZE, maxAlign);

    const convPayload = within(ctx, ctor.name, (inner) => inner.build(ctor.type, srcCtor.type, inner));
    const id = ctor.id;
    ctors.set(srcCtor.id, (src, s, dst, d) => {
      dest.writeTag(dst, d, id, le);
      convPayload(src, s, dst, d + dstPayloadOffset);
    });
  }

  return { ctors, srcPayloadOffset, maxAlign };
}

export function buildVariant(dest: DestVariant<unknown>, desc: TypeDesc, ctx: BuildContext): ConvFn {
  const { ctors, srcPayloadOffset } = planVariant(dest, desc, ctx);
  const le = ctx.config.littleEndian;
  const ignoreUnknown = ctx.config.unknownTag === "ignore";
  const trace = ctx.trace;
  const name = dest.name;

  return (src, s, dst, d) => {
    const tag = src.getUint32(s, le);
    const conv = ctors.get(tag);
    if (conv) {
      conv(src, s + srcPayloadOffset, dst, d);
      return;
    }
    if (!ignoreUnknown) {
      throw new ConversionError(unknownTag(tag));
    }
    trace.emit({ tag: "E_UnknownTag", dest: name, sourceTag: tag });
  };
}
