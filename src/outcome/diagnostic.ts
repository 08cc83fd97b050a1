/**
 * Location of a node inside an expression tree, as argument indices from the root.
 * `[]` is the root, `[1, 0]` the first argument of the root's second argument.
 */
export type NodePath = readonly number[];

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  path?: NodePath;
  data?: Record<string, unknown>;
  related?: Diagnostic[];
}

export function formatPath(path: NodePath): string {
  return `[${path.join(", ")}]`;
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.path && d.path.length > 0 ? ` at ${formatPath(d.path)}` : "";
  return `${d.severity} ${d.code}${where}: ${d.message}`;
}
