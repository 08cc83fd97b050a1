export {
  type TranslatorOptions,
  Translator,
  createTranslator,
  translate,
  translateOutcome,
  evaluate,
  literalText,
} from "./translate";
