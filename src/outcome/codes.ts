import type { Diagnostic, DiagnosticSeverity, NodePath } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Tree", template: "Cannot classify node of this shape: {node}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Malformed expression: {reason}" },

  E0101: { code: "E0101", severity: "error", category: "Scope", template: "Unresolved name: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Scope", template: "Wrong number of arguments to {name}: expected {expected}, got {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Scope", template: "{name} is bound as a {actual}, but is used as a {expected}" },

  E0201: { code: "E0201", severity: "error", category: "Limit", template: "Expression nests deeper than {limit} levels" },

  E0400: { code: "E0400", severity: "error", category: "Validation", template: "Invalid configuration: {reason}" },
  E0401: { code: "E0401", severity: "error", category: "Validation", template: "Invalid table entry {name}: {reason}" },
  E0402: { code: "E0402", severity: "error", category: "Validation", template: "Invalid element name: {tag}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  path?: NodePath
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  const diag: Diagnostic = {
    code: def.code,
    severity: def.severity,
    message,
  };
  if (path) diag.path = path;
  if (params) diag.data = { ...params };
  return diag;
}
