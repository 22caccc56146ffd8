/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans for harvest runs, batches and HTTP requests. No-op unless
 * OTEL_ENABLED=1 and the host process registers an OpenTelemetry SDK.
 */

import { trace, context, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'post-harvester';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique ID that ties the log lines of one harvest run together
 */
export function generateRunId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Create a span for one harvest batch
 *
 * @param batch - 1-based batch number within the run
 * @param offset - Cursor requested by the batch
 */
export async function withBatchSpan<T>(
  batch: number,
  offset: number,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Harvest batch', fn, {
    'harvest.batch': batch,
    'harvest.offset': offset,
  });
}

export async function withRunSpan<T>(
  runId: string,
  targetCount: number,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Harvest run', fn, {
    'harvest.run_id': runId,
    'harvest.target_count': targetCount,
  });
}

export function getCurrentSpan(): Span | undefined {
  if (!isOTelEnabled()) {
    return undefined;
  }
  return trace.getSpan(context.active());
}

/**
 * Add event to current span
 */
export function addSpanEvent(
  name: string,
  attributes?: Record<string, string | number | boolean>
): void {
  const span = getCurrentSpan();
  if (span) {
    span.addEvent(name, attributes);
  }
}
