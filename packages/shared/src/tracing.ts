/**
 * Tracing utilities — thin wrapper around the OpenTelemetry API.
 *
 * No SDK is registered here; without one every span is a no-op and the
 * helpers below still run the wrapped work.
 */
import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';

const TRACER_NAME = 'podsmith';

/**
 * Wrap an async function in an OTel span.
 * Records the error and sets the span status when `fn` rejects.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
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
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
