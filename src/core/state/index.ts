export {
  loadCompilerState,
  createCompilerState,
  type CompilerState,
  type SchemaDocument,
} from "./compiler-state.js";
