// src/core/render/tables.ts
// Process-wide known-symbol and known-function tables, built once from data and frozen.

import { TableError } from "../errors";
import { symbolBinding, type FunctionBinding, type SymbolBinding } from "../scope/binding";
import { binaryInfix, enclose, template, templateArity, unaryWrap } from "./renderers";
import texSymbols from "./data/tex-symbols.json";
import texFunctions from "./data/tex-functions.json";

export type FunctionSpec =
  | { name: string; kind: "wrap"; prefix: string; suffix: string }
  | { name: string; kind: "infix"; separator: string }
  | { name: string; kind: "template"; template: string }
  | { name: string; kind: "enclose"; open: string; close: string; separator: string; minArgs: number };

export type KnownTables = {
  readonly symbols: ReadonlyMap<string, SymbolBinding>;
  readonly functions: ReadonlyMap<string, FunctionBinding>;
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function field(entry: Record<string, unknown>, name: string, key: string): string {
  const v = entry[key];
  if (typeof v !== "string") throw new TableError(name, `"${key}" must be a string`);
  return v;
}

/** Validate one function-table entry read from data. */
export function parseFunctionSpec(entry: unknown): FunctionSpec {
  if (!isRecord(entry)) throw new TableError("?", "entry must be an object");
  const name = entry.name;
  if (typeof name !== "string" || name.length === 0) throw new TableError("?", "\"name\" must be a non-empty string");

  switch (entry.kind) {
    case "wrap":
      return { name, kind: "wrap", prefix: field(entry, name, "prefix"), suffix: field(entry, name, "suffix") };
    case "infix":
      return { name, kind: "infix", separator: field(entry, name, "separator") };
    case "template": {
      const text = field(entry, name, "template");
      if (templateArity(text) === 0) throw new TableError(name, "template has no $n slots");
      return { name, kind: "template", template: text };
    }
    case "enclose": {
      const minArgs = entry.minArgs ?? 0;
      if (typeof minArgs !== "number" || !Number.isInteger(minArgs) || minArgs < 0) {
        throw new TableError(name, "\"minArgs\" must be a non-negative integer");
      }
      return {
        name,
        kind: "enclose",
        open: field(entry, name, "open"),
        close: field(entry, name, "close"),
        separator: field(entry, name, "separator"),
        minArgs,
      };
    }
    default:
      throw new TableError(name, `unknown kind ${JSON.stringify(entry.kind)}`);
  }
}

export function functionFromSpec(spec: FunctionSpec): FunctionBinding {
  switch (spec.kind) {
    case "wrap": return unaryWrap(spec.prefix, spec.suffix);
    case "infix": return binaryInfix(spec.separator);
    case "template": return template(spec.template);
    case "enclose": return enclose(spec.open, spec.close, spec.separator, spec.minArgs);
  }
}

export function buildSymbolTable(entries: Iterable<[string, string]>): ReadonlyMap<string, SymbolBinding> {
  const out = new Map<string, SymbolBinding>();
  for (const [name, text] of entries) {
    if (out.has(name)) throw new TableError(name, "duplicate symbol");
    out.set(name, symbolBinding(text));
  }
  return out;
}

export function buildFunctionTable(entries: Iterable<unknown>): ReadonlyMap<string, FunctionBinding> {
  const out = new Map<string, FunctionBinding>();
  for (const entry of entries) {
    const spec = parseFunctionSpec(entry);
    if (out.has(spec.name)) throw new TableError(spec.name, "duplicate function");
    out.set(spec.name, functionFromSpec(spec));
  }
  return out;
}

export function makeTables(
  symbols: ReadonlyMap<string, SymbolBinding>,
  functions: ReadonlyMap<string, FunctionBinding>
): KnownTables {
  return Object.freeze({ symbols, functions });
}

export const DEFAULT_TABLES: KnownTables = makeTables(
  buildSymbolTable(Object.entries(texSymbols)),
  buildFunctionTable(texFunctions)
);

export type TableExtension = {
  /** name -> TeX text */
  symbols?: Record<string, string>;
  /** entries in the same shape as the data files */
  functions?: unknown[];
  /** hand-written renderers */
  bindings?: Record<string, FunctionBinding>;
};

/**
 * Derive new tables with extra or replacing entries. `base` is left as it is.
 */
export function extendTables(base: KnownTables, extra: TableExtension): KnownTables {
  const symbols = new Map(base.symbols);
  for (const [name, text] of Object.entries(extra.symbols ?? {})) symbols.set(name, symbolBinding(text));

  const functions = new Map(base.functions);
  for (const entry of extra.functions ?? []) {
    const spec = parseFunctionSpec(entry);
    functions.set(spec.name, functionFromSpec(spec));
  }
  for (const [name, binding] of Object.entries(extra.bindings ?? {})) {
    functions.set(name, Object.isFrozen(binding) ? binding : Object.freeze({ ...binding }));
  }

  return makeTables(symbols, functions);
}
