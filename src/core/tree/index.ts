export {
  type LiteralValue,
  type LiteralNode,
  type IdentifierNode,
  type CallNode,
  type ExprNode,
  type NodeKind,
  literal,
  identifier,
  call,
  assertNever,
  nodeToString,
  nodeEq,
  nodeSize,
} from "./node";
export { classify, checkNode, isExprNode, describeValue } from "./classify";
export { fromSexp, readExpr, readExprs } from "./fromSexp";
