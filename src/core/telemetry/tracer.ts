/**
 * Tracer Implementation
 *
 * Lightweight OpenTelemetry-compatible tracer used to time build stages.
 *
 * @module
 */

import * as crypto from "node:crypto";
import type {
  Span,
  SpanContext,
  SpanAttributes,
  SpanEvent,
  SpanStatus,
  SpanOptions,
  SpanData,
  Tracer,
  TelemetryConfig,
  AttributeValue,
} from "./types.js";
import { SpanStatusCode } from "./types.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("telemetry");

function generateTraceId(): string {
  return crypto.randomBytes(16).toString("hex");
}

function generateSpanId(): string {
  return crypto.randomBytes(8).toString("hex");
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// =============================================================================
// Span Implementation
// =============================================================================

class SpanImpl implements Span {
  readonly spanContext: SpanContext;
  readonly name: string;
  private _isEnded = false;
  private _startTime: number;
  private _endTime?: number;
  private _attributes: SpanAttributes = {};
  private _events: SpanEvent[] = [];
  private _status: SpanStatus = { code: SpanStatusCode.UNSET };
  private onEnd: (span: SpanData) => void;

  constructor(name: string, context: SpanContext, startTime: number, onEnd: (span: SpanData) => void) {
    this.name = name;
    this.spanContext = context;
    this._startTime = startTime;
    this.onEnd = onEnd;
  }

  get isEnded(): boolean {
    return this._isEnded;
  }

  get status(): SpanStatus {
    return this._status;
  }

  setAttribute(key: string, value: AttributeValue): this {
    if (!this._isEnded) {
      this._attributes[key] = value;
    }
    return this;
  }

  setAttributes(attributes: SpanAttributes): this {
    if (!this._isEnded) {
      Object.assign(this._attributes, attributes);
    }
    return this;
  }

  addEvent(name: string, attributes?: SpanAttributes): this {
    if (!this._isEnded) {
      this._events.push({ name, timestamp: Date.now(), attributes });
    }
    return this;
  }

  recordException(error: Error): this {
    if (!this._isEnded) {
      this._events.push({
        name: "exception",
        timestamp: Date.now(),
        attributes: {
          "exception.type": error.name,
          "exception.message": error.message,
          "exception.stacktrace": error.stack ?? "",
        },
      });
      if (this._status.code === SpanStatusCode.UNSET) {
        this._status = { code: SpanStatusCode.ERROR, message: error.message };
      }
    }
    return this;
  }

  setStatus(status: SpanStatus): this {
    if (!this._isEnded) {
      this._status = status;
    }
    return this;
  }

  end(endTime?: number): void {
    if (this._isEnded) return;

    this._isEnded = true;
    this._endTime = endTime ?? Date.now();
    this.onEnd(this.toSpanData());
  }

  toSpanData(): SpanData {
    const endTime = this._endTime ?? Date.now();
    return {
      context: this.spanContext,
      name: this.name,
      startTime: this._startTime,
      endTime,
      duration: endTime - this._startTime,
      attributes: { ...this._attributes },
      events: [...this._events],
      status: { ...this._status },
    };
  }
}

// =============================================================================
// No-Op Span (for disabled telemetry)
// =============================================================================

class NoOpSpan implements Span {
  readonly spanContext: SpanContext = {
    traceId: "0".repeat(32),
    spanId: "0".repeat(16),
  };
  readonly name = "";
  readonly isEnded = true;

  setAttribute(): this {
    return this;
  }
  setAttributes(): this {
    return this;
  }
  addEvent(): this {
    return this;
  }
  recordException(): this {
    return this;
  }
  setStatus(): this {
    return this;
  }
  end(): void {}
}

const NO_OP_SPAN = new NoOpSpan();

// =============================================================================
// Tracer Implementation
// =============================================================================

class TracerImpl implements Tracer {
  readonly name: string;
  private config: TelemetryConfig;
  private spanBuffer: SpanData[] = [];

  constructor(name: string, config: TelemetryConfig) {
    this.name = name;
    this.config = config;
  }

  startSpan(name: string, options?: SpanOptions): Span {
    return this.createSpan(name, options);
  }

  private createSpan(name: string, options?: SpanOptions): SpanImpl {
    const parent = options?.parent;
    const context: SpanContext = {
      traceId: parent?.spanContext.traceId ?? generateTraceId(),
      spanId: generateSpanId(),
      parentSpanId: parent?.spanContext.spanId,
    };

    const span = new SpanImpl(name, context, options?.startTime ?? Date.now(), (data) => {
      this.onSpanEnd(data);
    });

    if (options?.attributes) {
      span.setAttributes(options.attributes);
    }

    return span;
  }

  async withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, options?: SpanOptions): Promise<T> {
    const span = this.createSpan(name, options);
    try {
      const value = await fn(span);
      // fn may have marked a failed result
      if (span.status.code === SpanStatusCode.UNSET) {
        span.setStatus({ code: SpanStatusCode.OK });
      }
      return value;
    } catch (error) {
      span.recordException(toError(error));
      throw error;
    } finally {
      span.end();
    }
  }

  private onSpanEnd(spanData: SpanData): void {
    this.spanBuffer.push(spanData);

    const maxBuffer = this.config.maxBufferSize ?? 100;
    if (this.spanBuffer.length >= maxBuffer) {
      this.flush().catch((error: unknown) => {
        logger.warn({ err: toError(error), tracer: this.name }, "Span export failed");
      });
    }
  }

  /**
   * Flushes buffered spans to the exporter
   */
  async flush(): Promise<void> {
    if (!this.config.exporter || this.spanBuffer.length === 0) {
      return;
    }

    const spans = this.spanBuffer.splice(0);
    await this.config.exporter.export(spans);
  }

  async shutdown(): Promise<void> {
    await this.flush();
    if (this.config.exporter) {
      await this.config.exporter.shutdown();
    }
  }
}

// =============================================================================
// No-Op Tracer (for disabled telemetry)
// =============================================================================

class NoOpTracer implements Tracer {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  startSpan(): Span {
    return NO_OP_SPAN;
  }

  async withSpan<T>(_name: string, fn: (span: Span) => Promise<T> | T): Promise<T> {
    return fn(NO_OP_SPAN);
  }

  async flush(): Promise<void> {
    // nothing buffered
  }
}

// =============================================================================
// Telemetry Manager
// =============================================================================

class TelemetryManager {
  private config: TelemetryConfig = {
    enabled: false,
    serviceName: "graphql-forge",
    maxBufferSize: 100,
  };
  private tracers = new Map<string, TracerImpl>();

  init(config: Partial<TelemetryConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getTracer(name: string): Tracer {
    if (!this.config.enabled) {
      return new NoOpTracer(name);
    }

    let tracer = this.tracers.get(name);
    if (!tracer) {
      tracer = new TracerImpl(name, this.config);
      this.tracers.set(name, tracer);
    }
    return tracer;
  }

  /**
   * A tracer with the manager's configuration that is not registered. Its
   * span buffer belongs to the caller, who flushes it.
   */
  getScopedTracer(name: string): Tracer & { flush(): Promise<void> } {
    if (!this.config.enabled) {
      return new NoOpTracer(name);
    }
    return new TracerImpl(name, this.config);
  }

  async shutdown(): Promise<void> {
    await Promise.all(Array.from(this.tracers.values()).map((tracer) => tracer.shutdown()));
    this.tracers.clear();
  }

  get isEnabled(): boolean {
    return this.config.enabled;
  }
}

// =============================================================================
// Exports
// =============================================================================

/** Process-wide telemetry manager */
export const telemetry = new TelemetryManager();

export function initTelemetry(config: Partial<TelemetryConfig>): void {
  telemetry.init(config);
}

export function getTracer(name: string): Tracer {
  return telemetry.getTracer(name);
}

/**
 * An unregistered tracer for one run (see `TelemetryManager.getScopedTracer`).
 */
export function getScopedTracer(name: string): Tracer & { flush(): Promise<void> } {
  return telemetry.getScopedTracer(name);
}

export async function shutdownTelemetry(): Promise<void> {
  await telemetry.shutdown();
}

/**
 * A tracer outside the process-wide manager, flushed and shut down by its
 * owner. Builds that want their own spans (tests, a single CLI run) use this.
 */
export function createTracer(
  name: string,
  config: Partial<TelemetryConfig> & Pick<TelemetryConfig, "exporter">
): Tracer & { flush(): Promise<void>; shutdown(): Promise<void> } {
  return new TracerImpl(name, { enabled: true, serviceName: name, ...config });
}

export function createNoOpTracer(name: string): Tracer {
  return new NoOpTracer(name);
}
