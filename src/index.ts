/**
 * graphql-forge
 *
 * Library entry: the per-project build pipeline, its stages and the
 * multi-project compiler.
 *
 * @example
 * ```typescript
 * import { loadConfig, runCompiler } from "graphql-forge";
 *
 * const config = await loadConfig(process.cwd());
 * const result = await runCompiler(config);
 * ```
 */

export * from "./core/index.js";
export * from "./types/result.js";
export { createLogger, createChildLogger, setLogLevel, type Logger, type LogLevel } from "./utils/logger.js";
