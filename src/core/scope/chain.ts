// src/core/scope/chain.ts
// Per-translation scope chain. Parent links run
//   known-symbol -> fallback-symbol -> known-function -> fallback-call
// and every lookup starts at known-symbol. Identifiers resolve to the first Symbol
// binding and call heads to the first Function binding, so a name may be both.

import type { NotationConfig } from "../config";
import { callHeads, freeIdentifiers } from "../names";
import type { KnownTables } from "../render/tables";
import { opaqueCall, unknownName } from "../render/renderers";
import type { ExprNode } from "../tree";
import { symbolBinding, type Binding } from "./binding";
import { scopeExtend, scopeRoot, type ScopeTable } from "./scope";

export type ScopeChain = {
  /** Innermost table; pass this to resolveSymbol / resolveCall. */
  head: ScopeTable;
  /** Identifiers that got an identity binding. */
  fallbackSymbols: string[];
  /** Call heads that got an opaque-call binding. */
  fallbackCalls: string[];
};

export function buildScopeChain(tree: ExprNode, tables: KnownTables, notation: NotationConfig): ScopeChain {
  const fallbackCalls = callHeads(tree).filter(name => !tables.functions.has(name));
  const fallbackSymbols = freeIdentifiers(tree).filter(name => !tables.symbols.has(name));

  const callLayer = scopeRoot(
    "fallback-call",
    fallbackCalls.map((name): [string, Binding] => [name, opaqueCall(name, notation)])
  );
  const functionLayer = scopeExtend(callLayer, "known-function", tables.functions);
  const symbolFallbackLayer = scopeExtend(
    functionLayer,
    "fallback-symbol",
    fallbackSymbols.map((name): [string, Binding] => [name, symbolBinding(unknownName(name, notation))])
  );
  const head = scopeExtend(symbolFallbackLayer, "known-symbol", tables.symbols);

  return { head, fallbackSymbols, fallbackCalls };
}
