export {
  type Arity,
  type RenderFn,
  type SymbolBinding,
  type FunctionBinding,
  type Binding,
  ANY_ARITY,
  symbolBinding,
  functionBinding,
  bindingKind,
  arityToString,
  arityAccepts,
  applyBinding,
} from "./binding";
export {
  type ScopeLayer,
  type ScopeTable,
  type ScopeHit,
  scopeRoot,
  scopeExtend,
  scopeLookup,
  scopeLayers,
  resolveSymbol,
  resolveCall,
} from "./scope";
export { type ScopeChain, buildScopeChain } from "./chain";
