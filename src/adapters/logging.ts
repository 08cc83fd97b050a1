import { done, fail, formatDiagnostic, isDone, type Outcome } from "../outcome";
import type { SafeString } from "../core/safe";
import { isTranslateError } from "../core/errors";
import { isExprNode, nodeSize, type ExprNode } from "../core/tree";
import type { TraceEvent, TraceSink } from "../ports/types";
import type { TranslatorPort } from "../ports/translator";

function makeId(kind: string): string {
  const random = Math.random().toString(36).slice(2);
  return `${kind}:${Date.now()}:${random}`;
}

/**
 * Wrap a translator with start/done/failed trace events.
 */
export function loggingTranslator(inner: TranslatorPort, trace: TraceSink): TranslatorPort {
  function finish(id: string, start: number, out: Outcome<SafeString>): void {
    const durationMs = Date.now() - start;
    if (isDone(out)) {
      trace.emit({ tag: "E_TranslateDone", id, durationMs, length: out.value.length });
      return;
    }
    const [diagnostic] = out.failure.diagnostics;
    trace.emit({
      tag: "E_TranslateFailed",
      id,
      durationMs,
      diagnostic: diagnostic ?? { code: "E0000", severity: "error", message: out.failure.message },
    });
  }

  return {
    translate(tree: ExprNode): SafeString {
      const id = makeId("translate");
      const start = Date.now();
      trace.emit({ tag: "E_TranslateStart", id, nodes: isExprNode(tree) ? nodeSize(tree) : 0 });
      try {
        const res = inner.translate(tree);
        finish(id, start, done(res));
        return res;
      } catch (error) {
        if (isTranslateError(error)) {
          finish(id, start, fail(error.toFailure()));
        }
        throw error;
      }
    },
    translateOutcome(tree: ExprNode): Outcome<SafeString> {
      const id = makeId("translate");
      const start = Date.now();
      trace.emit({ tag: "E_TranslateStart", id, nodes: isExprNode(tree) ? nodeSize(tree) : 0 });
      const out = inner.translateOutcome(tree);
      finish(id, start, out);
      return { ...out, meta: { ...out.meta, runId: id, durationMs: Date.now() - start } };
    },
  };
}

/**
 * Collects events in memory.
 */
export function memoryTraceSink(): TraceSink & { events: TraceEvent[] } {
  const events: TraceEvent[] = [];
  return {
    events,
    emit(event: TraceEvent): void {
      events.push(event);
    },
  };
}

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_TranslateStart":
      return `[trace] ${event.id} start nodes=${event.nodes}`;
    case "E_ScopeBuilt":
      return `[trace] scope fallbackSymbols=[${event.fallbackSymbols.join(",")}] fallbackCalls=[${event.fallbackCalls.join(",")}]`;
    case "E_TranslateDone":
      return `[trace] ${event.id} done ${event.durationMs}ms length=${event.length}`;
    case "E_TranslateFailed":
      return `[trace] ${event.id} failed ${event.durationMs}ms ${formatDiagnostic(event.diagnostic)}`;
  }
}

/**
 * One line per event, to stderr unless another writer is given.
 */
export function consoleTraceSink(write: (line: string) => void = line => console.error(line)): TraceSink {
  return {
    emit(event: TraceEvent): void {
      write(formatTraceEvent(event));
    },
  };
}
