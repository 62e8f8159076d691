/**
 * Tracing utilities: a thin wrapper around the OpenTelemetry API.
 *
 * The library never starts an SDK; a host that wants traces registers one
 * before creating agents. Without an SDK every span is a no-op.
 */
import { trace, context, SpanStatusCode, type Span } from '@opentelemetry/api';
import { isAbortError } from './errors.js';

const TRACER_NAME = 'switchboard';

/** Get a tracer instance */
export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

/**
 * Wrap an async function in an OTel span.
 * Records errors and sets span status; a cancellation is marked on the span
 * but not recorded as an exception.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer();
  return context.with(context.active(), () => {
    return tracer.startActiveSpan(name, { attributes }, async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
        if (isAbortError(error)) {
          span.setAttribute('switchboard.canceled', true);
        } else {
          span.recordException(error instanceof Error ? error : new Error(String(error)));
        }
        throw error;
      } finally {
        span.end();
      }
    });
  });
}
