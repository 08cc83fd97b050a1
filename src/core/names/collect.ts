// src/core/names/collect.ts
// Name collection over an expression tree. Results keep first-encountered
// depth-first order, which makes fallback layers reproducible.

import { assertNever, type ExprNode } from "../tree";

function walkIdentifiers(node: ExprNode, out: Set<string>): void {
  switch (node.tag) {
    case "Literal":
      return;
    case "Identifier":
      out.add(node.name);
      return;
    case "Call":
      // The head names a function, not a value.
      for (const arg of node.args) walkIdentifiers(arg, out);
      return;
    default:
      assertNever(node);
  }
}

function walkCallHeads(node: ExprNode, out: Set<string>): void {
  switch (node.tag) {
    case "Literal":
    case "Identifier":
      return;
    case "Call":
      out.add(node.head);
      for (const arg of node.args) walkCallHeads(arg, out);
      return;
    default:
      assertNever(node);
  }
}

export function freeIdentifiers(node: ExprNode): string[] {
  const out = new Set<string>();
  walkIdentifiers(node, out);
  return Array.from(out);
}

export function callHeads(node: ExprNode): string[] {
  const out = new Set<string>();
  walkCallHeads(node, out);
  return Array.from(out);
}
