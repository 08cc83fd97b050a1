// src/core/translate/translate.ts
// classify -> collect names -> build chain -> evaluate -> wrap

import { DEFAULT_CONFIG, mergeConfigs, validateConfig, type ConfigOverrides, type TexformConfig } from "../config";
import { ConfigError, DepthLimitError, isTranslateError } from "../errors";
import { escape, wrap, type SafeString } from "../safe";
import { applyBinding, buildScopeChain, resolveCall, resolveSymbol, type ScopeTable } from "../scope";
import { DEFAULT_TABLES, type KnownTables } from "../render";
import { assertNever, checkNode, type ExprNode, type LiteralValue } from "../tree";
import { done, fail, failure, type NodePath, type Outcome } from "../../outcome";
import { nullTraceSink, type TraceSink } from "../../ports/types";
import type { TranslatorPort } from "../../ports/translator";

export type TranslatorOptions = {
  tables?: KnownTables;
  config?: TexformConfig | ConfigOverrides;
  trace?: TraceSink;
};

export function literalText(value: LiteralValue): string {
  if (typeof value === "string") return `\\text{${escape(value).toText()}}`;
  if (typeof value === "boolean") return value ? "\\mathrm{true}" : "\\mathrm{false}";
  if (Number.isNaN(value)) return "\\mathrm{NaN}";
  if (value === Infinity) return "\\infty";
  if (value === -Infinity) return "-\\infty";
  return String(value);
}

/**
 * Evaluate `node` against a built chain. Arguments render left to right
 * before the head is resolved.
 */
export function evaluate(node: ExprNode, scope: ScopeTable, maxDepth: number, path: NodePath = []): string {
  if (path.length > maxDepth) throw new DepthLimitError(maxDepth, path);

  switch (node.tag) {
    case "Literal":
      return literalText(node.value);
    case "Identifier":
      return resolveSymbol(scope, node.name, path);
    case "Call": {
      const args = node.args.map((arg, i) => evaluate(arg, scope, maxDepth, [...path, i]));
      const fn = resolveCall(scope, node.head, path);
      return applyBinding(node.head, fn, args, path);
    }
    default:
      return assertNever(node);
  }
}

function resolveConfig(config: TranslatorOptions["config"]): TexformConfig {
  if (!config) return DEFAULT_CONFIG;
  const merged = mergeConfigs(config);
  const validation = validateConfig(merged);
  if (!validation.valid) throw new ConfigError(validation.errors.join("; "));
  return merged;
}

export class Translator implements TranslatorPort {
  readonly tables: KnownTables;
  readonly config: TexformConfig;
  private readonly trace: TraceSink;

  constructor(options: TranslatorOptions = {}) {
    this.tables = options.tables ?? DEFAULT_TABLES;
    this.config = resolveConfig(options.config);
    this.trace = options.trace ?? nullTraceSink;
  }

  /**
   * Translate a tree into TeX. The input may come from outside the type
   * system, so its shape is checked before anything else runs.
   */
  translate(tree: ExprNode): SafeString {
    const checked = checkNode(tree, this.config.runtime.maxDepth);
    const chain = buildScopeChain(checked, this.tables, this.config.notation);
    this.trace.emit({
      tag: "E_ScopeBuilt",
      fallbackSymbols: chain.fallbackSymbols,
      fallbackCalls: chain.fallbackCalls,
    });
    const text = evaluate(checked, chain.head, this.config.runtime.maxDepth);
    // Renderer output is already TeX; escaping it again would break the macros.
    return wrap(text, "tex");
  }

  translateOutcome(tree: ExprNode): Outcome<SafeString> {
    try {
      return done(this.translate(tree));
    } catch (e) {
      if (isTranslateError(e)) return fail(e.toFailure());
      if (e instanceof RangeError) {
        // call stack exhausted before the depth limit was reached
        return fail(failure("limit-exceeded", e.message));
      }
      throw e;
    }
  }
}

export function createTranslator(options: TranslatorOptions = {}): Translator {
  return new Translator(options);
}

let defaultTranslator: Translator | undefined;

function getDefaultTranslator(): Translator {
  if (!defaultTranslator) defaultTranslator = new Translator();
  return defaultTranslator;
}

/** Translate with the default tables and configuration. */
export function translate(tree: ExprNode): SafeString {
  return getDefaultTranslator().translate(tree);
}

export function translateOutcome(tree: ExprNode): Outcome<SafeString> {
  return getDefaultTranslator().translateOutcome(tree);
}
