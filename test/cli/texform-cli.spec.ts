// test/cli/texform-cli.spec.ts
// Tests for the texform command's argument handling and output formatting

import { describe, it, expect } from "vitest";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  detectMode,
  buildConfig,
  formatError,
  translateSource,
  escapeText,
} from "../../bin/texform-cli-lib";
import { createTranslator } from "../../src/core/translate";
import { ArityError } from "../../src/core/errors";

describe("texform CLI", () => {
  describe("argument parsing", () => {
    it("parses flags", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
      expect(parseCliArgs(["-d", "--trace"])).toEqual({ debug: true, trace: true });
    });

    it("parses --eval with its expression", () => {
      expect(parseCliArgs(["--eval", "(sqrt x)"])).toEqual({ eval: "(sqrt x)", mode: "exec" });
    });

    it("parses --escape with a scheme", () => {
      expect(parseCliArgs(["--escape", "a<b", "--scheme", "html"])).toEqual({
        escape: "a<b",
        mode: "escape",
        scheme: "html",
      });
    });

    it("takes the first bare argument as the input file", () => {
      expect(parseCliArgs(["forms.tx", "other.tx"])).toEqual({ file: "forms.tx", mode: "exec" });
      expect(parseCliArgs(["-c", "texform.config.yaml", "forms.tx"]).config).toBe("texform.config.yaml");
    });

    it("ignores unknown flags", () => {
      expect(parseCliArgs(["--frobnicate"])).toEqual({});
    });
  });

  describe("mode and config", () => {
    it("defaults to the repl", () => {
      expect(detectMode({})).toBe("repl");
      expect(detectMode({ file: "x.tx" })).toBe("exec");
      expect(detectMode({ escape: "" })).toBe("escape");
    });

    it("builds a config from parsed args", () => {
      expect(buildConfig(parseCliArgs(["-e", "pi", "--trace"]))).toEqual({
        mode: "exec",
        debug: false,
        trace: true,
        scheme: "tex",
        code: "pi",
      });
    });

    it("rejects an unknown scheme", () => {
      expect(() => buildConfig({ scheme: "rtf" })).toThrow("unknown scheme: rtf (expected tex or html)");
    });
  });

  describe("output", () => {
    it("shows name and version", () => {
      expect(getVersion()).toBe("texform v0.1.0");
      expect(getHelpText()).toContain("--escape <text>");
    });

    it("translates every form in a source text", () => {
      const t = createTranslator();
      expect(translateSource("(sqrt x) pi", t)).toEqual(["\\sqrt{x}", "\\pi"]);
      expect(translateSource("pi", t, true)).toEqual(["#<safe:tex \\pi>"]);
    });

    it("escapes text", () => {
      expect(escapeText("50%", "tex")).toBe("50\\%");
      expect(escapeText("a<b", "html")).toBe("a&lt;b");
    });

    it("formats translation errors as diagnostics", () => {
      expect(formatError(new ArityError("sqrt", "1", 2, [0]))).toBe(
        "error E0102 at [0]: Wrong number of arguments to sqrt: expected 1, got 2"
      );
      expect(formatError(new Error("boom"))).toBe("error: boom");
      expect(formatError("boom")).toBe("error: boom");
    });
  });
});
