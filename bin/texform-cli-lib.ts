// bin/texform-cli-lib.ts
// Shared CLI utilities for the texform command
// Exported functions for testing

import { readExprs } from "../src/core/tree";
import { escape, isSchemeName, type SafeString, type SchemeName } from "../src/core/safe";
import { isTranslateError } from "../src/core/errors";
import { formatDiagnostic } from "../src/outcome";
import type { TranslatorPort } from "../src/ports/translator";
import pkg from "../package.json";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliMode = "repl" | "exec" | "escape";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  escape?: string;
  scheme?: string;
  config?: string;
  trace?: boolean;
  debug?: boolean;
  mode?: CliMode;
};

export type CliConfig = {
  mode: CliMode;
  debug: boolean;
  trace: boolean;
  scheme: SchemeName;
  code?: string;
  file?: string;
  text?: string;
  configFile?: string;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--debug" || arg === "-d") {
      result.debug = true;
    } else if (arg === "--trace") {
      result.trace = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
      result.mode = "exec";
    } else if (arg === "--escape") {
      result.escape = args[++i] ?? "";
      result.mode = "escape";
    } else if (arg === "--scheme") {
      result.scheme = args[++i];
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
        if (!result.mode) result.mode = "exec";
      }
    }
    // Ignore unknown flags
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
texform - translate expression trees to TeX

USAGE:
  texform [options]                   Start a line REPL
  texform [options] <file>            Translate every form in a file
  texform --eval <expr>               Translate expressions given inline
  texform --escape <text>             Escape text for the target scheme

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <expr>                  Translate and exit
  --escape <text>                    Escape text and exit
  --scheme tex|html                  Scheme used by --escape (default: tex)
  -c, --config <file>                Load configuration from a JSON or YAML file
  --trace                            Print trace events to stderr
  -d, --debug                        Print results in their tagged debug form

EXAMPLES:
  texform --eval "(+ pi (foo a))"    # \\pi + \\mathrm{foo}(a)
  texform --escape "50% of {x}"      # 50\\% of \\{x\\}
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  return `${pkg.name} v${pkg.version}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): CliMode {
  if (args.mode) return args.mode;
  if (args.escape !== undefined) return "escape";
  if (args.eval !== undefined || args.file) return "exec";
  return "repl";
}

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const scheme = args.scheme ?? "tex";
  if (!isSchemeName(scheme)) {
    throw new Error(`unknown scheme: ${scheme} (expected tex or html)`);
  }

  const config: CliConfig = {
    mode: detectMode(args),
    debug: args.debug ?? false,
    trace: args.trace ?? false,
    scheme,
  };

  if (args.eval !== undefined) config.code = args.eval;
  if (args.file) config.file = args.file;
  if (args.escape !== undefined) config.text = args.escape;
  if (args.config) config.configFile = args.config;

  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTION HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function formatResult(result: SafeString, debug: boolean): string {
  return debug ? result.toString() : result.toText();
}

export function formatError(error: unknown): string {
  if (isTranslateError(error)) return formatDiagnostic(error.diagnostic);
  return error instanceof Error ? `error: ${error.message}` : `error: ${String(error)}`;
}

/** Translate every top-level form in `src`, one output line each. */
export function translateSource(src: string, translator: TranslatorPort, debug = false): string[] {
  return readExprs(src).map(tree => formatResult(translator.translate(tree), debug));
}

export function escapeText(text: string, scheme: SchemeName, debug = false): string {
  return formatResult(escape(text, scheme), debug);
}
