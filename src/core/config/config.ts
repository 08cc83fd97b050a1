// src/core/config/config.ts
// Configuration for texform: defaults, environment, config files and overrides.

import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "../errors";

// =========================================================================
// Configuration Types
// =========================================================================

export type OpaqueCallStyle = "mathrm" | "operatorname";

export type NotationConfig = {
  /** Macro used to name an unknown function: \mathrm{f}(x) or \operatorname{f}(x) */
  opaqueCall: OpaqueCallStyle;
  /** Separator between arguments of an unknown function */
  argSeparator: string;
  /** Escape unknown names before emitting them, instead of passing them through */
  escapeUnknownNames: boolean;
};

export type RuntimeConfig = {
  /** Maximum nesting depth of an expression tree */
  maxDepth: number;
  /** Emit trace events to the console */
  trace: boolean;
};

export type TexformConfig = {
  notation: NotationConfig;
  runtime: RuntimeConfig;
};

export type ConfigOverrides = {
  notation?: Partial<NotationConfig>;
  runtime?: Partial<RuntimeConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const OPAQUE_CALL_STYLES: readonly OpaqueCallStyle[] = ["mathrm", "operatorname"];

export const DEFAULT_NOTATION_CONFIG: NotationConfig = {
  opaqueCall: "mathrm",
  argSeparator: ", ",
  escapeUnknownNames: false,
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  maxDepth: 512,
  trace: false,
};

export const DEFAULT_CONFIG: TexformConfig = {
  notation: DEFAULT_NOTATION_CONFIG,
  runtime: DEFAULT_RUNTIME_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["texform.config.json", "texform.config.yaml", "texform.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

function isOpaqueCallStyle(s: string): s is OpaqueCallStyle {
  return s === "mathrm" || s === "operatorname";
}

function parseBool(s: string | undefined): boolean | undefined {
  if (s === undefined || s === "") return undefined;
  const v = s.toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

function parseIntOr(s: string | undefined): number | undefined {
  const n = parseInt(s ?? "", 10);
  return Number.isNaN(n) ? undefined : n;
}

/**
 * Load configuration overrides from environment variables.
 * Unset variables leave the corresponding field out.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env, prefix = "TEXFORM"): ConfigOverrides {
  const notation: Partial<NotationConfig> = {};
  const runtime: Partial<RuntimeConfig> = {};

  const style = env[`${prefix}_OPAQUE_CALL`];
  if (style) {
    if (!isOpaqueCallStyle(style)) throw new ConfigError(`${prefix}_OPAQUE_CALL must be one of ${OPAQUE_CALL_STYLES.join(", ")}`);
    notation.opaqueCall = style;
  }
  const sep = env[`${prefix}_ARG_SEPARATOR`];
  if (sep !== undefined && sep !== "") notation.argSeparator = sep;
  const escapeUnknown = parseBool(env[`${prefix}_ESCAPE_UNKNOWN`]);
  if (escapeUnknown !== undefined) notation.escapeUnknownNames = escapeUnknown;

  const maxDepth = parseIntOr(env[`${prefix}_MAX_DEPTH`]);
  if (maxDepth !== undefined) runtime.maxDepth = maxDepth;
  const trace = parseBool(env[`${prefix}_TRACE`]);
  if (trace !== undefined) runtime.trace = trace;

  return { notation, runtime };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    try {
      data = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new ConfigError(`unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) throw new ConfigError(`${filePath} must contain an object`);
  return configFromObject(data);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function pick(obj: Record<string, unknown>, camel: string, snake: string): unknown {
  return obj[camel] ?? obj[snake];
}

function readField<T>(value: unknown, field: string, guard: (v: unknown) => v is T, what: string): T | undefined {
  if (value === undefined || value === null) return undefined;
  if (!guard(value)) throw new ConfigError(`${field} must be ${what}`);
  return value;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isInteger = (v: unknown): v is number => typeof v === "number" && Number.isInteger(v);
const isStyle = (v: unknown): v is OpaqueCallStyle => typeof v === "string" && isOpaqueCallStyle(v);

/**
 * Create configuration overrides from a plain object (e.g., from parsed JSON/YAML).
 * Both camelCase and snake_case keys are accepted.
 */
export function configFromObject(data: Record<string, unknown>): ConfigOverrides {
  const notationData = isRecord(data.notation) ? data.notation : {};
  const runtimeData = isRecord(data.runtime) ? data.runtime : {};

  const notation: Partial<NotationConfig> = {};
  const runtime: Partial<RuntimeConfig> = {};

  const opaqueCall = readField(pick(notationData, "opaqueCall", "opaque_call"), "notation.opaqueCall", isStyle, `one of ${OPAQUE_CALL_STYLES.join(", ")}`);
  if (opaqueCall !== undefined) notation.opaqueCall = opaqueCall;
  const argSeparator = readField(pick(notationData, "argSeparator", "arg_separator"), "notation.argSeparator", isString, "a string");
  if (argSeparator !== undefined) notation.argSeparator = argSeparator;
  const escapeUnknownNames = readField(pick(notationData, "escapeUnknownNames", "escape_unknown_names"), "notation.escapeUnknownNames", isBoolean, "a boolean");
  if (escapeUnknownNames !== undefined) notation.escapeUnknownNames = escapeUnknownNames;

  const maxDepth = readField(pick(runtimeData, "maxDepth", "max_depth"), "runtime.maxDepth", isInteger, "an integer");
  if (maxDepth !== undefined) runtime.maxDepth = maxDepth;
  const trace = readField(runtimeData.trace, "runtime.trace", isBoolean, "a boolean");
  if (trace !== undefined) runtime.trace = trace;

  return { notation, runtime };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigOverrides[]): TexformConfig {
  const result: TexformConfig = {
    notation: { ...DEFAULT_NOTATION_CONFIG },
    runtime: { ...DEFAULT_RUNTIME_CONFIG },
  };

  for (const cfg of configs) {
    if (cfg.notation) {
      result.notation = { ...result.notation, ...cfg.notation };
    }
    if (cfg.runtime) {
      result.runtime = { ...result.runtime, ...cfg.runtime };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}): TexformConfig {
  const layers: ConfigOverrides[] = [configFromEnv(options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  const config = mergeConfigs(...layers);
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigError(validation.errors.join("; "));
  }
  return config;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    if (indent < 0) continue;

    while (stack.length > 1 && stack[stack.length - 1]!.indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1]!.obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: TexformConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isOpaqueCallStyle(config.notation.opaqueCall)) {
    errors.push(`notation.opaqueCall must be one of ${OPAQUE_CALL_STYLES.join(", ")}`);
  }
  if (!Number.isInteger(config.runtime.maxDepth) || config.runtime.maxDepth < 1) {
    errors.push("runtime.maxDepth must be at least 1");
  } else if (config.runtime.maxDepth > 10_000) {
    warnings.push("runtime.maxDepth is very high, deep trees may overflow the call stack");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
