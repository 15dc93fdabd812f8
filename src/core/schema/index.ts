export { CompilerSchema } from "./compiler-schema.js";
export { buildSchema, COMPILER_DIRECTIVES_SDL, COMPILER_DIRECTIVE_NAMES } from "./build-schema.js";
