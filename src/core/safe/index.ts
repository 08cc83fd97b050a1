export { SafeString, SAFE_TAG, isSafeString, escape, wrap, decode, concat } from "./safeString";
export {
  type SchemeName,
  type EscapeRule,
  type EscapeScheme,
  TEX_SCHEME,
  HTML_SCHEME,
  SCHEMES,
  isSchemeName,
} from "./schemes";
