import type { ConvertConfig } from "../config/config";
import { encodeDesc } from "../desc/codec";
import type { TypeDesc } from "../desc/desc";
import { showDesc } from "../desc/show";
import type { DestType } from "../dest/types";
import { nullSink, type TraceSink } from "../ports/trace";
import { buildConv, compile, makeConverter, resolveConfig, type BuildOptions, type Compiled, type Converter } from "./into";

/**
 * Converters keyed on (destination type, source shape).
 *
 * The destination is keyed by identity, the source by its canonical
 * encoding, so structurally equal descriptors share one converter.
 * Failed builds are not cached.
 */
export class ConverterCache {
  private byDest = new WeakMap<DestType, Map<string, Compiled>>();
  private count = 0;
  private readonly config: ConvertConfig;
  private readonly trace: TraceSink;

  constructor(options: BuildOptions = {}) {
    this.config = resolveConfig(options);
    this.trace = options.trace ?? nullSink;
  }

  /**
   * Builds stored since construction or the last `clear`. Entries of a
   * destination type that has been garbage collected still count.
   */
  get size(): number {
    return this.count;
  }

  get<T>(dest: DestType<T>, desc: TypeDesc): Converter<T> {
    const key = encodeDesc(desc);
    let shapes = this.byDest.get(dest);
    if (!shapes) {
      shapes = new Map();
      this.byDest.set(dest, shapes);
    }

    const hit = shapes.get(key);
    if (hit) {
      this.trace.emit({ tag: "E_CacheHit", dest: dest.name, source: showDesc(desc) });
      return makeConverter(dest, hit, this.config);
    }

    this.trace.emit({ tag: "E_CacheMiss", dest: dest.name, source: showDesc(desc) });
    const compiled = compile(dest, desc, { config: this.config, trace: this.trace, path: [], build: buildConv });
    shapes.set(key, compiled);
    this.count++;
    return makeConverter(dest, compiled, this.config);
  }

  clear(): void {
    this.byDest = new WeakMap();
    this.count = 0;
  }
}
