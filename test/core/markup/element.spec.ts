import { describe, it, expect } from "vitest";
import { element, mathSpan } from "../../../src/core/markup";
import { escape, wrap } from "../../../src/core/safe";
import { readExpr } from "../../../src/core/tree";
import { translate } from "../../../src/core/translate";
import { MarkupError } from "../../../src/core/errors";

describe("element", () => {
  it("escapes raw text children", () => {
    const p = element("p", "a < b");
    expect(p.scheme).toBe("html");
    expect(p.toText()).toBe("<p>a &lt; b</p>");
  });

  it("does not escape nested elements twice", () => {
    expect(element("div", element("b", "x&y")).toText()).toBe("<div><b>x&amp;y</b></div>");
  });

  it("passes html-safe children through and escapes tex ones", () => {
    expect(element("td", wrap("&nbsp;", "html")).toText()).toBe("<td>&nbsp;</td>");
    expect(element("td", escape("a&b")).toText()).toBe("<td>a\\&amp;b</td>");
  });

  it("rejects tag names that are not names", () => {
    expect(() => element("sc ript")).toThrow(MarkupError);
    expect(() => element("sc ript")).toThrow("Invalid element name: sc ript");
    expect(() => element("1p")).toThrow(MarkupError);
  });

  it("allows an empty element", () => {
    expect(element("br").toText()).toBe("<br></br>");
  });
});

describe("mathSpan", () => {
  it("embeds translated TeX in html", () => {
    const tex = translate(readExpr("(< a b)"));
    expect(tex.toText()).toBe("a < b");
    expect(mathSpan(tex).toText()).toBe("<span>\\(a &lt; b\\)</span>");
  });
});
