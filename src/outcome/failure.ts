import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "classification-failed"
  | "syntax-error"
  | "binding-kind-mismatch"
  | "arity-mismatch"
  | "invariant-violated"
  | "limit-exceeded"
  | "validation-failed"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    context: opts?.context,
  };
}
