import type { Diagnostic } from "../outcome";

/**
 * Trace event types for translation logging.
 */
export type TraceEvent =
  | { tag: "E_TranslateStart"; id: string; nodes: number }
  | { tag: "E_ScopeBuilt"; fallbackSymbols: string[]; fallbackCalls: string[] }
  | { tag: "E_TranslateDone"; id: string; durationMs: number; length: number }
  | { tag: "E_TranslateFailed"; id: string; durationMs: number; diagnostic: Diagnostic };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

export const nullTraceSink: TraceSink = {
  emit(): void {},
};
