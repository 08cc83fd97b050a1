// src/core/scope/scope.ts
// Parent-linked lookup tables. A chain is built per translation and dropped afterwards.

import { BindingKindError, UnresolvedNameError } from "../errors";
import type { NodePath } from "../../outcome";
import { bindingKind, type Binding, type FunctionBinding } from "./binding";

export type ScopeLayer =
  | "fallback-call"
  | "known-function"
  | "fallback-symbol"
  | "known-symbol";

export type ScopeTable = {
  readonly layer: ScopeLayer;
  readonly frame: ReadonlyMap<string, Binding>;
  readonly parent?: ScopeTable;
};

export type ScopeHit = { binding: Binding; layer: ScopeLayer };

export function scopeRoot(layer: ScopeLayer, entries: Iterable<[string, Binding]>): ScopeTable {
  return Object.freeze({ layer, frame: new Map(entries) });
}

/** New child frame whose lookups fall back to `parent`. */
export function scopeExtend(parent: ScopeTable, layer: ScopeLayer, entries: Iterable<[string, Binding]>): ScopeTable {
  return Object.freeze({ layer, frame: new Map(entries), parent });
}

export function scopeLookup(table: ScopeTable, name: string): ScopeHit | undefined {
  for (let cur: ScopeTable | undefined = table; cur; cur = cur.parent) {
    const hit = cur.frame.get(name);
    if (hit !== undefined) return { binding: hit, layer: cur.layer };
  }
  return undefined;
}

/** Layers from `table` outward, for debugging and tests. */
export function scopeLayers(table: ScopeTable): ScopeLayer[] {
  const out: ScopeLayer[] = [];
  for (let cur: ScopeTable | undefined = table; cur; cur = cur.parent) out.push(cur.layer);
  return out;
}

/**
 * First binding for `name` of the given kind, walking outward past bindings of
 * the other kind. A name bound only as the other kind is a kind error.
 */
function resolveKind<K extends Binding["tag"]>(
  table: ScopeTable,
  name: string,
  tag: K,
  path: NodePath | undefined
): Extract<Binding, { tag: K }> {
  let other: Binding | undefined;
  for (let cur: ScopeTable | undefined = table; cur; cur = cur.parent) {
    const hit = cur.frame.get(name);
    if (hit === undefined) continue;
    if (isKind(hit, tag)) return hit;
    if (!other) other = hit;
  }
  if (!other) throw new UnresolvedNameError(name, path);
  throw new BindingKindError(name, tag === "Symbol" ? "symbol" : "function", bindingKind(other), path);
}

function isKind<K extends Binding["tag"]>(b: Binding, tag: K): b is Extract<Binding, { tag: K }> {
  return b.tag === tag;
}

export function resolveSymbol(table: ScopeTable, name: string, path?: NodePath): string {
  return resolveKind(table, name, "Symbol", path).text;
}

export function resolveCall(table: ScopeTable, name: string, path?: NodePath): FunctionBinding {
  return resolveKind(table, name, "Function", path);
}
