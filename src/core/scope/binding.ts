// src/core/scope/binding.ts

import { ArityError, type BindingKindName } from "../errors";
import type { NodePath } from "../../outcome";

export type Arity =
  | { readonly exact: number }
  | { readonly atLeast: number };

/** Receives already-rendered argument text, in source order. */
export type RenderFn = (args: readonly string[]) => string;

export type SymbolBinding = { readonly tag: "Symbol"; readonly text: string };
export type FunctionBinding = { readonly tag: "Function"; readonly arity: Arity; readonly render: RenderFn };

export type Binding = SymbolBinding | FunctionBinding;

export const ANY_ARITY: Arity = Object.freeze({ atLeast: 0 });

export function symbolBinding(text: string): SymbolBinding {
  return Object.freeze({ tag: "Symbol", text });
}

export function functionBinding(arity: Arity, render: RenderFn): FunctionBinding {
  return Object.freeze({ tag: "Function", arity: Object.freeze({ ...arity }), render });
}

export function bindingKind(b: Binding): BindingKindName {
  return b.tag === "Symbol" ? "symbol" : "function";
}

export function arityToString(arity: Arity): string {
  return "exact" in arity ? String(arity.exact) : `at least ${arity.atLeast}`;
}

export function arityAccepts(arity: Arity, count: number): boolean {
  return "exact" in arity ? count === arity.exact : count >= arity.atLeast;
}

/** Check the argument count, then render. */
export function applyBinding(name: string, fn: FunctionBinding, args: readonly string[], path?: NodePath): string {
  if (!arityAccepts(fn.arity, args.length)) {
    throw new ArityError(name, arityToString(fn.arity), args.length, path);
  }
  return fn.render(args);
}
