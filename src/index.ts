// src/index.ts
// texform - Public API
//
// Expression trees in, TeX out.

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSLATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type TranslatorOptions,
  Translator,
  createTranslator,
  translate,
  translateOutcome,
} from "./core/translate";
export type { TranslatorPort } from "./ports/translator";

// ═══════════════════════════════════════════════════════════════════════════════
// TREES & READER
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type ExprNode,
  type LiteralValue,
  type NodeKind,
  literal,
  identifier,
  call,
  classify,
  checkNode,
  isExprNode,
  nodeToString,
  readExpr,
  readExprs,
} from "./core/tree";
export { freeIdentifiers, callHeads } from "./core/names";
export { parseSexp, parseSexpAll } from "./core/sexp";

// ═══════════════════════════════════════════════════════════════════════════════
// SAFE STRINGS & MARKUP
// ═══════════════════════════════════════════════════════════════════════════════

export { SafeString, type SchemeName, isSafeString, escape, wrap, decode, concat } from "./core/safe";
export { element, mathSpan } from "./core/markup";

// ═══════════════════════════════════════════════════════════════════════════════
// SCOPES & TABLES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Binding,
  type FunctionBinding,
  type SymbolBinding,
  type ScopeTable,
  type ScopeChain,
  symbolBinding,
  functionBinding,
  buildScopeChain,
  resolveSymbol,
  resolveCall,
} from "./core/scope";
export {
  type KnownTables,
  type FunctionSpec,
  type TableExtension,
  DEFAULT_TABLES,
  extendTables,
  unaryWrap,
  binaryInfix,
  template,
  enclose,
} from "./core/render";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG, ERRORS & TRACING
// ═══════════════════════════════════════════════════════════════════════════════

export { type TexformConfig, type ConfigOverrides, DEFAULT_CONFIG, loadConfig, validateConfig } from "./core/config";
export {
  TranslateError,
  ClassificationError,
  BindingKindError,
  ArityError,
  UnresolvedNameError,
  DepthLimitError,
  ReaderError,
  isTranslateError,
} from "./core/errors";
export { type Outcome, type Failure, type Diagnostic, isDone, isFail, unwrap, formatDiagnostic } from "./outcome";
export type { TraceEvent, TraceSink } from "./ports/types";
export { loggingTranslator, memoryTraceSink, consoleTraceSink } from "./adapters/logging";
