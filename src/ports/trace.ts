import type { FailureReason } from "../outcome/failure";

/**
 * Trace event types emitted while building and applying converters.
 */
export type TraceEvent =
  | { tag: "E_ConverterBuilt"; dest: string; source: string; durationMs: number }
  | { tag: "E_BuildFailed"; dest: string; source: string; reason: FailureReason; message: string }
  | { tag: "E_FieldIgnored"; path: string[]; field: string }
  | { tag: "E_CtorSkipped"; path: string[]; ctor: string }
  | { tag: "E_UnknownTag"; dest: string; sourceTag: number }
  | { tag: "E_CacheHit"; dest: string; source: string }
  | { tag: "E_CacheMiss"; dest: string; source: string };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

export const nullSink: TraceSink = {
  emit(): void {},
};

export interface MemorySink extends TraceSink {
  readonly events: TraceEvent[];
  clear(): void;
}

/**
 * Collect events in memory, newest last.
 */
export function memorySink(limit = 1000): MemorySink {
  const events: TraceEvent[] = [];
  return {
    events,
    emit(event: TraceEvent): void {
      events.push(event);
      if (events.length > limit) {
        events.shift();
      }
    },
    clear(): void {
      events.length = 0;
    },
  };
}
