// src/core/tree/node.ts
// Expression trees handed to the translator. Callers own them; nothing here mutates one.

export type LiteralValue = number | string | boolean;

export type LiteralNode = { readonly tag: "Literal"; readonly value: LiteralValue };
export type IdentifierNode = { readonly tag: "Identifier"; readonly name: string };
export type CallNode = { readonly tag: "Call"; readonly head: string; readonly args: readonly ExprNode[] };

export type ExprNode = LiteralNode | IdentifierNode | CallNode;

export type NodeKind = ExprNode["tag"];

export function literal(value: LiteralValue): ExprNode { return { tag: "Literal", value }; }
export function identifier(name: string): ExprNode { return { tag: "Identifier", name }; }
export function call(head: string, args: readonly ExprNode[] = []): ExprNode { return { tag: "Call", head, args }; }

export function assertNever(x: never): never {
  throw new Error(`unreachable: ${JSON.stringify(x)}`);
}

export function nodeToString(node: ExprNode): string {
  switch (node.tag) {
    case "Literal":
      if (typeof node.value === "string") return JSON.stringify(node.value);
      if (typeof node.value === "boolean") return node.value ? "#t" : "#f";
      return Number.isFinite(node.value) ? String(node.value) : "nan";
    case "Identifier":
      return node.name;
    case "Call":
      return `(${[node.head, ...node.args.map(nodeToString)].join(" ")})`;
    default:
      return assertNever(node);
  }
}

export function nodeEq(a: ExprNode, b: ExprNode): boolean {
  switch (a.tag) {
    case "Literal":
      return b.tag === "Literal" && Object.is(a.value, b.value);
    case "Identifier":
      return b.tag === "Identifier" && a.name === b.name;
    case "Call": {
      if (b.tag !== "Call" || a.head !== b.head || a.args.length !== b.args.length) return false;
      for (let i = 0; i < a.args.length; i++) {
        const x = a.args[i];
        const y = b.args[i];
        if (x === undefined || y === undefined || !nodeEq(x, y)) return false;
      }
      return true;
    }
    default:
      return assertNever(a);
  }
}

export function nodeSize(node: ExprNode): number {
  let size = 0;
  const pending: ExprNode[] = [node];
  for (let cur = pending.pop(); cur; cur = pending.pop()) {
    size++;
    if (cur.tag === "Call") pending.push(...cur.args);
  }
  return size;
}
