// src/core/render/renderers.ts
// Binding builders for each rendering rule shape.

import { escape } from "../safe";
import type { NotationConfig } from "../config";
import { ANY_ARITY, functionBinding, type FunctionBinding } from "../scope/binding";

/** prefix + arg + suffix */
export function unaryWrap(prefix: string, suffix: string): FunctionBinding {
  return functionBinding({ exact: 1 }, ([arg]) => `${prefix}${arg}${suffix}`);
}

/** arg1 + separator + arg2 */
export function binaryInfix(separator: string): FunctionBinding {
  return functionBinding({ exact: 2 }, ([a, b]) => `${a}${separator}${b}`);
}

const SLOT_RE = /\$([1-9])/g;

export function templateArity(text: string): number {
  let max = 0;
  for (const m of text.matchAll(SLOT_RE)) max = Math.max(max, Number(m[1]));
  return max;
}

/**
 * Fill `$1`..`$9` slots in one pass, so argument text containing `$n`
 * is never substituted again.
 */
export function template(text: string): FunctionBinding {
  return functionBinding({ exact: templateArity(text) }, args =>
    text.replace(SLOT_RE, (_, d: string) => args[Number(d) - 1] ?? "")
  );
}

/** open + args joined by separator + close */
export function enclose(open: string, close: string, separator: string, minArgs = 0): FunctionBinding {
  return functionBinding({ atLeast: minArgs }, args => `${open}${args.join(separator)}${close}`);
}

export function unknownName(name: string, notation: NotationConfig): string {
  return notation.escapeUnknownNames ? escape(name).toText() : name;
}

/** Unknown function, shown by name: \mathrm{f}(a, b) */
export function opaqueCall(name: string, notation: NotationConfig): FunctionBinding {
  const head = `\\${notation.opaqueCall}{${unknownName(name, notation)}}`;
  return functionBinding(ANY_ARITY, args => `${head}(${args.join(notation.argSeparator)})`);
}
