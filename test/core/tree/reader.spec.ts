import { describe, it, expect } from "vitest";
import { call, identifier, literal, nodeEq, readExpr, readExprs } from "../../../src/core/tree";
import { parseSexp, sexpToString } from "../../../src/core/sexp";
import { ReaderError } from "../../../src/core/errors";

describe("readExpr", () => {
  it("reads calls, identifiers and literals", () => {
    const node = readExpr("(+ pi (foo a))");
    expect(nodeEq(node, call("+", [identifier("pi"), call("foo", [identifier("a")])]))).toBe(true);
  });

  it("reads numbers, strings and booleans as literals", () => {
    expect(readExpr("-2.5")).toEqual(literal(-2.5));
    expect(readExpr('"a b"')).toEqual(literal("a b"));
    expect(readExpr("#t")).toEqual(literal(true));
    expect(readExpr("false")).toEqual(literal(false));
  });

  it("treats operator characters as symbols", () => {
    expect(readExpr("(<= x y)")).toEqual(call("<=", [identifier("x"), identifier("y")]));
  });

  it("decodes string escapes", () => {
    expect(readExpr('"say \\"hi\\"\\n"')).toEqual(literal('say "hi"\n'));
  });

  it("rejects malformed input", () => {
    expect(() => readExpr("()")).toThrow(ReaderError);
    expect(() => readExpr("()")).toThrow("Malformed expression: empty call ()");
    expect(() => readExpr("(1 2)")).toThrow("Malformed expression: call head must be a symbol, got 1");
    expect(() => readExpr("(f x")).toThrow("Malformed expression: unterminated list");
    expect(() => readExpr(")")).toThrow("Malformed expression: unexpected ')'");
    expect(() => readExpr("a b")).toThrow("Malformed expression: trailing tokens after first expression");
    expect(() => readExpr("")).toThrow("Malformed expression: empty input");
    expect(() => readExpr('"open')).toThrow("Malformed expression: unterminated string");
  });
});

describe("readExprs", () => {
  it("reads every top-level form and skips comments", () => {
    const forms = readExprs("x ; the first\n(f y)\n");
    expect(forms).toEqual([identifier("x"), call("f", [identifier("y")])]);
  });

  it("returns nothing for blank input", () => {
    expect(readExprs("  ; only a comment")).toEqual([]);
  });
});

describe("parseSexp", () => {
  it("prints what it reads", () => {
    expect(sexpToString(parseSexp('(f 1 "s" #t (g))'))).toBe('(f 1 "s" #t (g))');
  });
});
