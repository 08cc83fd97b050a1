// src/core/sexp/sexp.ts
// S-expression reader used by the CLI and tests to build expression trees from text.

import { ReaderError } from "../errors";

export type Sexp =
  | { tag: "Sym"; name: string }
  | { tag: "Num"; n: number }
  | { tag: "Str"; s: string }
  | { tag: "Bool"; b: boolean }
  | { tag: "List"; items: Sexp[] };

export function sym(name: string): Sexp { return { tag: "Sym", name }; }
export function num(n: number): Sexp { return { tag: "Num", n }; }
export function str(s: string): Sexp { return { tag: "Str", s }; }
export function bool(b: boolean): Sexp { return { tag: "Bool", b }; }
export function list(items: Sexp[]): Sexp { return { tag: "List", items }; }

export function sexpToString(x: Sexp): string {
  switch (x.tag) {
    case "Sym": return x.name;
    case "Num": return Number.isFinite(x.n) ? String(x.n) : "nan";
    case "Str": return JSON.stringify(x.s);
    case "Bool": return x.b ? "#t" : "#f";
    case "List": return `(${x.items.map(sexpToString).join(" ")})`;
  }
}

// ----- Parser -----

type Tok =
  | { tag: "LP" }
  | { tag: "RP" }
  | { tag: "STR"; s: string }
  | { tag: "ATOM"; s: string };

/** Read exactly one expression. */
export function parseSexp(src: string): Sexp {
  const [first, ...rest] = parseSexpAll(src);
  if (first === undefined) throw new ReaderError("empty input");
  if (rest.length > 0) throw new ReaderError("trailing tokens after first expression");
  return first;
}

/** Read every top-level form in `src`. */
export function parseSexpAll(src: string): Sexp[] {
  const toks = tokenize(src);
  let i = 0;

  function take(): Tok {
    const t = toks[i];
    if (!t) throw new ReaderError("unexpected end of input");
    i++;
    return t;
  }

  function parseOne(): Sexp {
    const t = take();
    if (t.tag === "LP") {
      const items: Sexp[] = [];
      while (true) {
        const p = toks[i];
        if (!p) throw new ReaderError("unterminated list");
        if (p.tag === "RP") { i++; break; }
        items.push(parseOne());
      }
      return list(items);
    }
    if (t.tag === "RP") throw new ReaderError("unexpected ')'");
    if (t.tag === "STR") return str(t.s);
    return atomToSexp(t.s);
  }

  const out: Sexp[] = [];
  while (i < toks.length) out.push(parseOne());
  return out;
}

function atomToSexp(a: string): Sexp {
  if (a === "#t" || a === "true") return bool(true);
  if (a === "#f" || a === "false") return bool(false);
  if (/^[+-]?\d+(\.\d+)?$/.test(a)) return num(Number(a));
  return sym(a);
}

const STRING_ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "\"": "\"", "\\": "\\" };

function tokenize(src: string): Tok[] {
  const out: Tok[] = [];
  let i = 0;

  const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";

  while (i < src.length) {
    const c = src[i]!;
    if (isWS(c)) { i++; continue; }

    if (c === ";") {
      while (i < src.length && src[i] !== "\n") i++;
      continue;
    }

    if (c === "(") { out.push({ tag: "LP" }); i++; continue; }
    if (c === ")") { out.push({ tag: "RP" }); i++; continue; }

    if (c === "\"") {
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i]!;
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\") {
          const e = src[i + 1];
          if (e === undefined) throw new ReaderError("unterminated escape");
          s += STRING_ESCAPES[e] ?? e;
          i += 2;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) throw new ReaderError("unterminated string");
      out.push({ tag: "STR", s });
      continue;
    }

    let a = "";
    while (i < src.length) {
      const d = src[i]!;
      if (isWS(d) || d === "(" || d === ")" || d === "\"" || d === ";") break;
      a += d;
      i++;
    }
    out.push({ tag: "ATOM", s: a });
  }

  return out;
}
