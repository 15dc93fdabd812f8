/**
 * Trace Exporters
 *
 * File export in Chrome trace format (open in chrome://tracing or Perfetto)
 * and an in-memory exporter for tests.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { SpanData, SpanExporter } from "./types.js";
import { SpanStatusCode } from "./types.js";

/**
 * Chrome trace "complete" event
 */
interface ChromeTraceEvent {
  name: string;
  cat: string;
  ph: "X";
  /** microseconds */
  ts: number;
  dur: number;
  pid: number;
  tid: string;
  args?: Record<string, unknown>;
}

interface ChromeTraceFormat {
  traceEvents: ChromeTraceEvent[];
  displayTimeUnit: "ms";
  metadata: Record<string, unknown>;
}

export interface FileExporterOptions {
  /** Directory to write the trace file into */
  outputDir: string;
  /** File name prefix (default: "trace") */
  filePrefix?: string;
  prettyPrint?: boolean;
}

/**
 * Collects spans and writes them to one JSON file on shutdown.
 */
export class FileTraceExporter implements SpanExporter {
  private options: Required<FileExporterOptions>;
  private events: ChromeTraceEvent[] = [];
  private isShutDown = false;

  constructor(options: FileExporterOptions) {
    this.options = {
      outputDir: options.outputDir,
      filePrefix: options.filePrefix ?? "trace",
      prettyPrint: options.prettyPrint ?? false,
    };
  }

  private spanToEvent(span: SpanData): ChromeTraceEvent {
    return {
      name: span.name,
      cat: "graphql-forge",
      ph: "X",
      ts: span.startTime * 1000,
      dur: span.duration * 1000,
      pid: process.pid,
      // one row per trace, i.e. per project build
      tid: span.context.traceId.substring(0, 8),
      args: {
        ...span.attributes,
        spanId: span.context.spanId,
        parentSpanId: span.context.parentSpanId,
        status: SpanStatusCode[span.status.code],
        statusMessage: span.status.message,
      },
    };
  }

  async export(spans: SpanData[]): Promise<void> {
    if (this.isShutDown) return;
    this.events.push(...spans.map((span) => this.spanToEvent(span)));
  }

  /**
   * Writes the collected events. Returns without writing when nothing was exported.
   */
  async shutdown(): Promise<void> {
    this.isShutDown = true;
    if (this.events.length === 0) return;

    const traceData: ChromeTraceFormat = {
      traceEvents: this.events,
      displayTimeUnit: "ms",
      metadata: {
        serviceName: "graphql-forge",
        exportedAt: new Date().toISOString(),
        spanCount: this.events.length,
      },
    };

    const content = this.options.prettyPrint ? JSON.stringify(traceData, null, 2) : JSON.stringify(traceData);
    const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
    await fs.promises.mkdir(this.options.outputDir, { recursive: true });
    await fs.promises.writeFile(
      path.join(this.options.outputDir, `${this.options.filePrefix}-${timestamp}.json`),
      content,
      "utf-8"
    );
  }
}

/**
 * Exports spans to memory for testing and inspection.
 */
export class MemoryTraceExporter implements SpanExporter {
  private spans: SpanData[] = [];

  async export(spans: SpanData[]): Promise<void> {
    this.spans.push(...spans);
  }

  async shutdown(): Promise<void> {}

  getSpans(): SpanData[] {
    return [...this.spans];
  }

  findByName(name: string): SpanData | undefined {
    return this.spans.find((s) => s.name === name);
  }
}
