/**
 * Telemetry Types
 *
 * OpenTelemetry-shaped interfaces for build timing spans. Spans are advisory:
 * nothing in the pipeline reads them back.
 *
 * @module
 */

/**
 * Span status codes following OpenTelemetry conventions
 */
export enum SpanStatusCode {
  UNSET = 0,
  OK = 1,
  ERROR = 2,
}

export interface SpanStatus {
  code: SpanStatusCode;
  message?: string;
}

/**
 * Context identifying a span within a trace
 */
export interface SpanContext {
  /** 128-bit hex trace identifier */
  traceId: string;
  /** 64-bit hex span identifier */
  spanId: string;
  /** Parent span identifier (undefined for root spans) */
  parentSpanId?: string;
}

export type AttributeValue = string | number | boolean | string[] | number[];

export type SpanAttributes = Record<string, AttributeValue>;

export interface SpanEvent {
  name: string;
  timestamp: number;
  attributes?: SpanAttributes;
}

/**
 * A span times a single operation. Ending twice is a no-op.
 */
export interface Span {
  readonly spanContext: SpanContext;
  readonly name: string;
  readonly isEnded: boolean;

  setAttribute(key: string, value: AttributeValue): this;
  setAttributes(attributes: SpanAttributes): this;
  addEvent(name: string, attributes?: SpanAttributes): this;
  /** Records the error as an event and sets ERROR status if none is set. */
  recordException(error: Error): this;
  setStatus(status: SpanStatus): this;
  end(endTime?: number): void;
}

export interface SpanOptions {
  attributes?: SpanAttributes;
  startTime?: number;
  /** Parent span; without one the span starts a new trace. */
  parent?: Span;
}

/**
 * Creates spans for one instrumentation scope. A tracer keeps no notion of
 * a "current" span: parents are always passed explicitly, so concurrent
 * builds never adopt each other's spans.
 */
export interface Tracer {
  readonly name: string;

  startSpan(name: string, options?: SpanOptions): Span;

  /**
   * Runs `fn` inside a span that ends when `fn` settles, on every exit
   * path. A thrown error is recorded and rethrown.
   */
  withSpan<T>(name: string, fn: (span: Span) => Promise<T> | T, options?: SpanOptions): Promise<T>;
}

/**
 * Completed span data for export
 */
export interface SpanData {
  context: SpanContext;
  name: string;
  /** ms since epoch */
  startTime: number;
  endTime: number;
  duration: number;
  attributes: SpanAttributes;
  events: SpanEvent[];
  status: SpanStatus;
}

export interface SpanExporter {
  export(spans: SpanData[]): Promise<void>;
  shutdown(): Promise<void>;
}

export interface TelemetryConfig {
  enabled: boolean;
  serviceName: string;
  exporter?: SpanExporter;
  /** Spans buffered before an export is triggered */
  maxBufferSize?: number;
}
