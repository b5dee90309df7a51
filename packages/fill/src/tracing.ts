/**
 * Span helper for resolve calls.
 *
 * Wraps tracer.startActiveSpan with attribute setting, exception recording
 * and status propagation. Without a registered tracer provider the span is
 * a no-op.
 */

import { type Attributes, SpanStatusCode, trace } from "@opentelemetry/api";

const TRACER_NAME = "mediaref";

export const RESOLVE_SPAN = "mediaref.fill.resolve";

/**
 * Execute an async function within a named span. Errors from `fn` are
 * recorded on the span and rethrown unchanged.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      span.setAttributes(attributes);
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
