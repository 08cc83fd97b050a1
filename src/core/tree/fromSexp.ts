// src/core/tree/fromSexp.ts

import { ReaderError } from "../errors";
import { parseSexp, parseSexpAll, sexpToString, type Sexp } from "../sexp";
import { call, identifier, literal, type ExprNode } from "./node";

export function fromSexp(x: Sexp): ExprNode {
  switch (x.tag) {
    case "Sym": return identifier(x.name);
    case "Num": return literal(x.n);
    case "Str": return literal(x.s);
    case "Bool": return literal(x.b);
    case "List": {
      const [head, ...rest] = x.items;
      if (head === undefined) throw new ReaderError("empty call ()");
      if (head.tag !== "Sym") throw new ReaderError(`call head must be a symbol, got ${sexpToString(head)}`);
      return call(head.name, rest.map(fromSexp));
    }
  }
}

export function readExpr(src: string): ExprNode {
  return fromSexp(parseSexp(src));
}

export function readExprs(src: string): ExprNode[] {
  return parseSexpAll(src).map(fromSexp);
}
