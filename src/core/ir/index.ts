export * from "./types.js";
export { buildIR, locationOf, type BuildIRResult } from "./build-ir.js";
