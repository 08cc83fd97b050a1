// src/core/safe/schemes.ts
// Reserved-character tables for each target notation.

export type SchemeName = "tex" | "html";

export type EscapeRule = {
  readonly char: string;
  readonly replacement: string;
};

/**
 * An escape scheme is an ordered rule list. The first rule always covers the
 * scheme's escape-prefix character.
 */
export type EscapeScheme = {
  readonly name: SchemeName;
  readonly rules: readonly EscapeRule[];
};

export const TEX_SCHEME: EscapeScheme = Object.freeze({
  name: "tex",
  rules: Object.freeze([
    { char: "\\", replacement: "\\textbackslash{}" },
    { char: "{", replacement: "\\{" },
    { char: "}", replacement: "\\}" },
    { char: "$", replacement: "\\$" },
    { char: "&", replacement: "\\&" },
    { char: "#", replacement: "\\#" },
    { char: "%", replacement: "\\%" },
    { char: "_", replacement: "\\_" },
    { char: "^", replacement: "\\textasciicircum{}" },
    { char: "~", replacement: "\\textasciitilde{}" },
  ]),
});

export const HTML_SCHEME: EscapeScheme = Object.freeze({
  name: "html",
  rules: Object.freeze([
    { char: "&", replacement: "&amp;" },
    { char: "<", replacement: "&lt;" },
    { char: ">", replacement: "&gt;" },
    { char: "\"", replacement: "&quot;" },
    { char: "'", replacement: "&#39;" },
  ]),
});

export const SCHEMES: Readonly<Record<SchemeName, EscapeScheme>> = Object.freeze({
  tex: TEX_SCHEME,
  html: HTML_SCHEME,
});

export function isSchemeName(s: string): s is SchemeName {
  return s === "tex" || s === "html";
}

function regexQuote(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

type CompiledScheme = {
  encodeRe: RegExp;
  encodeMap: Map<string, string>;
  decodeRe: RegExp;
  decodeMap: Map<string, string>;
};

const compiled = new Map<SchemeName, CompiledScheme>();

// A single scan over the input means replacement text is never rescanned,
// so the prefix rule coming first is all the ordering the encoder needs.
function compile(scheme: EscapeScheme): CompiledScheme {
  const hit = compiled.get(scheme.name);
  if (hit) return hit;

  const encodeMap = new Map<string, string>();
  const decodeMap = new Map<string, string>();
  for (const rule of scheme.rules) {
    encodeMap.set(rule.char, rule.replacement);
    decodeMap.set(rule.replacement, rule.char);
  }

  const chars = scheme.rules.map(r => regexQuote(r.char)).join("|");
  const sequences = scheme.rules
    .map(r => r.replacement)
    .sort((a, b) => b.length - a.length)
    .map(regexQuote)
    .join("|");

  const out: CompiledScheme = {
    encodeRe: new RegExp(chars, "g"),
    encodeMap,
    decodeRe: new RegExp(sequences, "g"),
    decodeMap,
  };
  compiled.set(scheme.name, out);
  return out;
}

export function encodeText(text: string, scheme: EscapeScheme): string {
  const c = compile(scheme);
  return text.replace(c.encodeRe, ch => c.encodeMap.get(ch) ?? ch);
}

export function decodeText(text: string, scheme: EscapeScheme): string {
  const c = compile(scheme);
  return text.replace(c.decodeRe, seq => c.decodeMap.get(seq) ?? seq);
}
