import type { Outcome } from "../outcome";
import type { SafeString } from "../core/safe";
import type { ExprNode } from "../core/tree";

/**
 * Anything that turns an expression tree into encoded TeX.
 */
export interface TranslatorPort {
  /** Throws a TranslateError on failure. */
  translate(tree: ExprNode): SafeString;
  /** Never throws for translation errors; reports them as a Fail. */
  translateOutcome(tree: ExprNode): Outcome<SafeString>;
}
