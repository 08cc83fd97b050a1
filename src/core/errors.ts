// src/core/errors.ts
// Translation-time errors. Each carries the diagnostic it was raised with.

import { makeDiagnostic, type Diagnostic, type DiagnosticCode, type NodePath } from "../outcome";
import { failure, type Failure, type FailureReason } from "../outcome/failure";

export class TranslateError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(
    public readonly code: DiagnosticCode,
    public readonly reason: FailureReason,
    params: Record<string, string | number>,
    path?: NodePath
  ) {
    const diagnostic = makeDiagnostic(code, params, path);
    super(diagnostic.message);
    this.name = "TranslateError";
    this.diagnostic = diagnostic;
  }

  toFailure(): Failure {
    return failure(this.reason, this.message, {
      diagnostics: [this.diagnostic],
      context: this.diagnostic.data,
    });
  }
}

export class ClassificationError extends TranslateError {
  constructor(public readonly description: string, path?: NodePath) {
    super("E0001", "classification-failed", { node: description }, path);
    this.name = "ClassificationError";
  }
}

export class ReaderError extends TranslateError {
  constructor(reason: string) {
    super("E0002", "syntax-error", { reason });
    this.name = "ReaderError";
  }
}

export class UnresolvedNameError extends TranslateError {
  constructor(public readonly bindingName: string, path?: NodePath) {
    super("E0101", "invariant-violated", { name: bindingName }, path);
    this.name = "UnresolvedNameError";
  }
}

export class ArityError extends TranslateError {
  constructor(
    public readonly bindingName: string,
    public readonly expected: string,
    public readonly actual: number,
    path?: NodePath
  ) {
    super("E0102", "arity-mismatch", { name: bindingName, expected, actual }, path);
    this.name = "ArityError";
  }
}

export type BindingKindName = "symbol" | "function";

export class BindingKindError extends TranslateError {
  constructor(
    public readonly bindingName: string,
    public readonly required: BindingKindName,
    public readonly found: BindingKindName,
    path?: NodePath
  ) {
    super("E0103", "binding-kind-mismatch", { name: bindingName, expected: required, actual: found }, path);
    this.name = "BindingKindError";
  }
}

export class DepthLimitError extends TranslateError {
  constructor(public readonly limit: number, path?: NodePath) {
    super("E0201", "limit-exceeded", { limit }, path);
    this.name = "DepthLimitError";
  }
}

export class TableError extends TranslateError {
  constructor(entryName: string, reason: string) {
    super("E0401", "validation-failed", { name: entryName, reason });
    this.name = "TableError";
  }
}

export class ConfigError extends TranslateError {
  constructor(reason: string) {
    super("E0400", "validation-failed", { reason });
    this.name = "ConfigError";
  }
}

export class MarkupError extends TranslateError {
  constructor(tag: string) {
    super("E0402", "validation-failed", { tag });
    this.name = "MarkupError";
  }
}

export function isTranslateError(e: unknown): e is TranslateError {
  return e instanceof TranslateError;
}
