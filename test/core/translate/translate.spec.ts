import { describe, it, expect } from "vitest";
import { createTranslator, literalText, translate, translateOutcome } from "../../../src/core/translate";
import { call, identifier, literal, readExpr } from "../../../src/core/tree";
import { DEFAULT_TABLES, extendTables } from "../../../src/core/render";
import { functionBinding } from "../../../src/core/scope";
import { escape } from "../../../src/core/safe";
import { isDone, isFail } from "../../../src/outcome";
import {
  ArityError,
  ClassificationError,
  ConfigError,
  DepthLimitError,
} from "../../../src/core/errors";
import { memoryTraceSink } from "../../../src/adapters/logging";

const text = (src: string) => translate(readExpr(src)).toText();

describe("translate", () => {
  it("renders a known symbol", () => {
    expect(translate(identifier("pi")).toText()).toBe("\\pi");
  });

  it("renders an unknown identifier as itself", () => {
    expect(translate(identifier("x")).toText()).toBe("x");
  });

  it("renders a known unary function", () => {
    expect(translate(call("sqrt", [identifier("x")])).toText()).toBe("\\sqrt{x}");
  });

  it("mixes known operators, symbols and unknown calls", () => {
    const tree = call("+", [identifier("pi"), call("foo", [identifier("a")])]);
    expect(translate(tree).toText()).toBe("\\pi + \\mathrm{foo}(a)");
  });

  it("fails on a wrong argument count, naming the function", () => {
    const tree = call("sqrt", [identifier("x"), identifier("y")]);
    expect(() => translate(tree)).toThrow(ArityError);
    try {
      translate(tree);
    } catch (e) {
      expect(e).toBeInstanceOf(ArityError);
      if (e instanceof ArityError) {
        expect(e.bindingName).toBe("sqrt");
        expect(e.expected).toBe("1");
        expect(e.actual).toBe(2);
        expect(e.message).toBe("Wrong number of arguments to sqrt: expected 1, got 2");
      }
    }
  });

  it("prefers a known symbol over the identity fallback", () => {
    expect(text("(+ alpha alpha)")).toBe("\\alpha + \\alpha");
    expect(text("(sqrt theta)")).toBe("\\sqrt{\\theta}");
  });

  it("translates trees made only of unknown names", () => {
    expect(text("(zeta2 (quux m n))")).toBe("\\mathrm{zeta2}(\\mathrm{quux}(m, n))");
    expect(text("(nothing)")).toBe("\\mathrm{nothing}()");
  });

  it("translates a name used both as a value and as a call", () => {
    expect(text("(f f)")).toBe("\\mathrm{f}(f)");
    expect(text("(g (f x) f)")).toBe("\\mathrm{g}(\\mathrm{f}(x), f)");
  });

  it("renders a known symbol in call position as an opaque call", () => {
    expect(text("(pi x)")).toBe("\\mathrm{pi}(x)");
    expect(text("(+ pi (pi))")).toBe("\\pi + \\mathrm{pi}()");
  });

  it("renders a known function in value position as its name", () => {
    expect(text("(+ sqrt 1)")).toBe("sqrt + 1");
  });

  it("renders nested templates", () => {
    expect(text("(/ (+ a 1) (sqrt theta))")).toBe("\\frac{a + 1}{\\sqrt{\\theta}}");
    expect(text("(= (expt x 2) (set 1 2))")).toBe("{x}^{2} = \\{1, 2\\}");
  });

  it("reports minimum arity", () => {
    expect(() => text("(min)")).toThrow("Wrong number of arguments to min: expected at least 1, got 0");
  });

  it("records where in the tree a failure happened", () => {
    try {
      text("(+ a (sqrt))");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ArityError);
      if (e instanceof ArityError) expect(e.diagnostic.path).toEqual([1]);
    }
  });

  it("rejects input that is not an expression tree", () => {
    const bad = JSON.parse('{"tag":"Call","head":"f","args":[{"tag":"Bogus"}]}');
    expect(() => translate(bad)).toThrow(ClassificationError);
    expect(() => translate(bad)).toThrow('Cannot classify node of this shape: {"tag":"Bogus"}');
  });

  it("returns tex that is not escaped again", () => {
    const out = translate(call("sqrt", [identifier("x")]));
    expect(out.scheme).toBe("tex");
    expect(escape(out)).toBe(out);
  });

  it("does not carry bindings from one call to the next", () => {
    expect(text("(foo a)")).toBe("\\mathrm{foo}(a)");
    expect(text("(+ foo 1)")).toBe("foo + 1");
  });
});

describe("literalText", () => {
  it("renders each literal kind", () => {
    expect(literalText(3)).toBe("3");
    expect(literalText(-2.5)).toBe("-2.5");
    expect(literalText(Infinity)).toBe("\\infty");
    expect(literalText(-Infinity)).toBe("-\\infty");
    expect(literalText(NaN)).toBe("\\mathrm{NaN}");
    expect(literalText(true)).toBe("\\mathrm{true}");
    expect(literalText("50% off")).toBe("\\text{50\\% off}");
  });

  it("is used for literals in a tree", () => {
    expect(translate(call("+", [literal("n_1"), literal(2)])).toText()).toBe("\\text{n\\_1} + 2");
  });
});

describe("createTranslator", () => {
  it("uses the configured opaque-call style", () => {
    const t = createTranslator({ config: { notation: { opaqueCall: "operatorname", argSeparator: "; " } } });
    expect(t.translate(readExpr("(foo a b)")).toText()).toBe("\\operatorname{foo}(a; b)");
  });

  it("escapes unknown names when configured to", () => {
    const t = createTranslator({ config: { notation: { escapeUnknownNames: true } } });
    expect(t.translate(readExpr("(my_fn x_1)")).toText()).toBe("\\mathrm{my\\_fn}(x\\_1)");
  });

  it("stops at the configured depth", () => {
    const t = createTranslator({ config: { runtime: { maxDepth: 2 } } });
    expect(() => t.translate(readExpr("(f (g (h x)))"))).toThrow(DepthLimitError);
    expect(() => t.translate(readExpr("(f (g (h x)))"))).toThrow("Expression nests deeper than 2 levels");
    expect(t.translate(readExpr("(f (g x))")).toText()).toBe("\\mathrm{f}(\\mathrm{g}(x))");
  });

  it("reports trees far deeper than the limit as a depth failure", () => {
    let tree = identifier("x");
    for (let i = 0; i < 20_000; i++) tree = call("f", [tree]);

    expect(() => translate(tree)).toThrow(DepthLimitError);
    expect(() => translate(tree)).toThrow("Expression nests deeper than 512 levels");
    const out = translateOutcome(tree);
    expect(isFail(out) && out.failure.diagnostics[0]?.code).toBe("E0201");
  });

  it("rejects an invalid configuration", () => {
    expect(() => createTranslator({ config: { runtime: { maxDepth: 0 } } })).toThrow(ConfigError);
  });

  it("accepts extended tables", () => {
    const tables = extendTables(DEFAULT_TABLES, {
      symbols: { nn: "\\mathbb{N}_0" },
      bindings: { choose: functionBinding({ exact: 2 }, ([n, k]) => `{}^{${n}}C_{${k}}`) },
    });
    const t = createTranslator({ tables });
    expect(t.translate(readExpr("(choose nn k)")).toText()).toBe("{}^{\\mathbb{N}_0}C_{k}");
  });

  it("emits the synthesized fallbacks to its trace sink", () => {
    const sink = memoryTraceSink();
    createTranslator({ trace: sink }).translate(readExpr("(+ pi (foo a))"));
    expect(sink.events).toEqual([{ tag: "E_ScopeBuilt", fallbackSymbols: ["a"], fallbackCalls: ["foo"] }]);
  });
});

describe("translateOutcome", () => {
  it("wraps a successful translation", () => {
    const out = translateOutcome(readExpr("(sqrt x)"));
    expect(isDone(out)).toBe(true);
    if (isDone(out)) expect(out.value.toText()).toBe("\\sqrt{x}");
  });

  it("reports translation errors as failures", () => {
    const out = translateOutcome(readExpr("(sqrt x y)"));
    expect(isFail(out)).toBe(true);
    if (isFail(out)) {
      expect(out.failure.reason).toBe("arity-mismatch");
      expect(out.failure.message).toBe("Wrong number of arguments to sqrt: expected 1, got 2");
      expect(out.failure.diagnostics[0]?.code).toBe("E0102");
      expect(out.failure.context).toEqual({ name: "sqrt", expected: "1", actual: 2 });
    }
  });

  it("reports malformed trees as failures", () => {
    const out = translateOutcome(JSON.parse('{"tag":"Call","head":"f","args":[{"tag":"Bogus"}]}'));
    expect(isFail(out) && out.failure.reason).toBe("classification-failed");
  });
});
