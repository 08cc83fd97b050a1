import { describe, it, expect } from "vitest";
import { callHeads, freeIdentifiers } from "../../../src/core/names";
import { call, identifier, literal, readExpr } from "../../../src/core/tree";

describe("freeIdentifiers", () => {
  it("collects identifiers below calls but not call heads", () => {
    expect(freeIdentifiers(readExpr("(+ pi (foo a))"))).toEqual(["pi", "a"]);
    expect(freeIdentifiers(call("f"))).toEqual([]);
  });

  it("handles leaves", () => {
    expect(freeIdentifiers(literal(1))).toEqual([]);
    expect(freeIdentifiers(identifier("x"))).toEqual(["x"]);
  });

  it("deduplicates in first-encountered order", () => {
    expect(freeIdentifiers(readExpr("(f y (g x y) (f x))"))).toEqual(["y", "x"]);
  });
});

describe("callHeads", () => {
  it("collects the head of every nested call", () => {
    expect(callHeads(readExpr("(+ pi (foo a))"))).toEqual(["+", "foo"]);
    expect(callHeads(readExpr("(f (g (h 1)))"))).toEqual(["f", "g", "h"]);
  });

  it("is empty for leaves", () => {
    expect(callHeads(literal("s"))).toEqual([]);
    expect(callHeads(identifier("x"))).toEqual([]);
  });

  it("deduplicates in first-encountered order", () => {
    expect(callHeads(readExpr("(f x (g x y) (f y))"))).toEqual(["f", "g"]);
  });
});
