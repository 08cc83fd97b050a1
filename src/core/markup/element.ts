// src/core/markup/element.ts
// Minimal HTML element builder over SafeString.

import { MarkupError } from "../errors";
import { concat, escape, wrap, type SafeString } from "../safe";

export type Content = string | SafeString;

const TAG_RE = /^[A-Za-z][A-Za-z0-9-]*$/;

/**
 * `<tag>children</tag>`. Raw strings and TeX-encoded children are escaped for
 * HTML; children that are already HTML pass through.
 */
export function element(tag: string, ...children: Content[]): SafeString {
  if (!TAG_RE.test(tag)) throw new MarkupError(tag);
  return concat("html", wrap(`<${tag}>`, "html"), ...children.map(c => escape(c, "html")), wrap(`</${tag}>`, "html"));
}

/** Inline math for renderers that look for \( ... \) delimiters. */
export function mathSpan(tex: SafeString): SafeString {
  return element("span", wrap("\\(", "html"), tex, wrap("\\)", "html"));
}
