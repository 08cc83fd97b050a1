export { unaryWrap, binaryInfix, template, templateArity, enclose, opaqueCall, unknownName } from "./renderers";
export {
  type FunctionSpec,
  type KnownTables,
  type TableExtension,
  parseFunctionSpec,
  functionFromSpec,
  buildSymbolTable,
  buildFunctionTable,
  makeTables,
  DEFAULT_TABLES,
  extendTables,
} from "./tables";
