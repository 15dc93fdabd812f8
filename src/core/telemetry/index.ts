/**
 * Telemetry Module
 *
 * Timing spans for build stages.
 *
 * @example
 * ```typescript
 * import { createTracer, MemoryTraceExporter } from './core/telemetry/index.js';
 *
 * const exporter = new MemoryTraceExporter();
 * const tracer = createTracer('build', { exporter });
 * await tracer.withSpan('build_schema web', () => buildSchema(state, project));
 * await tracer.flush();
 * ```
 *
 * @module
 */

export * from "./types.js";

export {
  telemetry,
  initTelemetry,
  getTracer,
  getScopedTracer,
  shutdownTelemetry,
  createTracer,
  createNoOpTracer,
} from "./tracer.js";

export { FileTraceExporter, MemoryTraceExporter, type FileExporterOptions } from "./file-exporter.js";
