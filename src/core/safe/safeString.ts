// src/core/safe/safeString.ts
// Text that is already encoded for one target notation.

import { SCHEMES, encodeText, decodeText, type SchemeName } from "./schemes";

export const SAFE_TAG = "#<safe";

/**
 * A SafeString can only be produced by `escape`, `wrap` or `concat`.
 * Plain `string` values are treated as untrusted content.
 */
export class SafeString {
  private constructor(
    private readonly text: string,
    readonly scheme: SchemeName
  ) {
    Object.freeze(this);
  }

  /** @internal */
  static of(text: string, scheme: SchemeName): SafeString {
    return new SafeString(text, scheme);
  }

  toText(): string {
    return this.text;
  }

  get length(): number {
    return this.text.length;
  }

  /** Debug form, tagged so that accidental interpolation shows up in output. */
  toString(): string {
    return `${SAFE_TAG}:${this.scheme} ${this.text}>`;
  }

  toJSON(): { scheme: SchemeName; text: string } {
    return { scheme: this.scheme, text: this.text };
  }

  equals(other: SafeString): boolean {
    return this.scheme === other.scheme && this.text === other.text;
  }
}

export function isSafeString(x: unknown): x is SafeString {
  return x instanceof SafeString;
}

export function escape(input: string | SafeString, scheme: SchemeName = "tex"): SafeString {
  if (isSafeString(input)) {
    if (input.scheme === scheme) return input;
    return SafeString.of(encodeText(input.toText(), SCHEMES[scheme]), scheme);
  }
  return SafeString.of(encodeText(input, SCHEMES[scheme]), scheme);
}

/** Marks `raw` as already valid for `scheme` without inspecting it. */
export function wrap(raw: string, scheme: SchemeName = "tex"): SafeString {
  return SafeString.of(raw, scheme);
}

export function decode(text: string | SafeString, scheme: SchemeName = "tex"): string {
  const raw = isSafeString(text) ? text.toText() : text;
  return decodeText(raw, SCHEMES[scheme]);
}

export function concat(scheme: SchemeName, ...parts: Array<string | SafeString>): SafeString {
  return SafeString.of(parts.map(p => escape(p, scheme).toText()).join(""), scheme);
}
