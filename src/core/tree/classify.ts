// src/core/tree/classify.ts
// Shape checks for nodes arriving from outside the type system (JSON, other hosts).

import { ClassificationError, DepthLimitError } from "../errors";
import type { NodePath } from "../../outcome";
import type { ExprNode, NodeKind } from "./node";

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

export function describeValue(x: unknown): string {
  if (x === undefined) return "undefined";
  if (typeof x === "function") return "function";
  if (typeof x === "bigint" || typeof x === "symbol") return String(x);
  let s: string;
  try {
    s = JSON.stringify(x);
  } catch {
    // cyclic structures
    s = Object.prototype.toString.call(x);
  }
  return s.length > 80 ? `${s.slice(0, 77)}...` : s;
}

function kindOf(x: unknown): NodeKind | undefined {
  if (!isRecord(x)) return undefined;
  switch (x.tag) {
    case "Literal": {
      const v = x.value;
      return typeof v === "number" || typeof v === "string" || typeof v === "boolean" ? "Literal" : undefined;
    }
    case "Identifier":
      return typeof x.name === "string" && x.name.length > 0 ? "Identifier" : undefined;
    case "Call":
      return typeof x.head === "string" && x.head.length > 0 && Array.isArray(x.args) ? "Call" : undefined;
    default:
      return undefined;
  }
}

/** Kind of a single node, judged from its own fields only. */
export function classify(x: unknown, path: NodePath = []): NodeKind {
  const kind = kindOf(x);
  if (kind === undefined) throw new ClassificationError(describeValue(x), path);
  return kind;
}

/**
 * Validate a whole tree and return a typed copy of it.
 * The first node that fails to classify is reported with its path; nodes nested
 * deeper than `maxDepth` raise a DepthLimitError before anything recurses further.
 */
export function checkNode(x: unknown, maxDepth = Infinity, path: NodePath = []): ExprNode {
  if (path.length > maxDepth) throw new DepthLimitError(maxDepth, path);
  const kind = classify(x, path);
  if (!isRecord(x)) throw new ClassificationError(describeValue(x), path);
  const { value, name, head, args } = x;
  switch (kind) {
    case "Literal":
      if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") {
        return { tag: "Literal", value };
      }
      break;
    case "Identifier":
      if (typeof name === "string") return { tag: "Identifier", name };
      break;
    case "Call":
      if (typeof head === "string" && Array.isArray(args)) {
        const children: unknown[] = args;
        return { tag: "Call", head, args: children.map((a, i) => checkNode(a, maxDepth, [...path, i])) };
      }
      break;
  }
  throw new ClassificationError(describeValue(x), path);
}

export function isExprNode(x: unknown): x is ExprNode {
  const pending: unknown[] = [x];
  while (pending.length > 0) {
    const cur = pending.pop();
    const kind = kindOf(cur);
    if (kind === undefined) return false;
    if (kind === "Call" && isRecord(cur) && Array.isArray(cur.args)) {
      const children: unknown[] = cur.args;
      pending.push(...children);
    }
  }
  return true;
}
