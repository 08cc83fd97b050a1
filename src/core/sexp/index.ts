// src/core/sexp/index.ts
// S-expression reader

export {
  type Sexp,
  sym,
  num,
  str,
  bool,
  list,
  sexpToString,
  parseSexp,
  parseSexpAll,
} from "./sexp";
