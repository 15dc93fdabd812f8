/**
 * Core module - the build pipeline and its stages
 */

export * from "./errors.js";

export * from "./config/index.js";
export * from "./source/index.js";
export * from "./state/index.js";
export * from "./documents/index.js";
export * from "./schema/index.js";
export * from "./ir/index.js";
export * from "./program/index.js";
export * from "./validate/index.js";
export * from "./transforms/index.js";
export * from "./codegen/index.js";
export * from "./writer/index.js";
export * from "./telemetry/index.js";
export * from "./build-project/index.js";
export * from "./compiler/index.js";
