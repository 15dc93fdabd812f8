export { runCompiler, type CompilerOptions, type CompilerResult, type ProjectOutcome } from "./compiler.js";
