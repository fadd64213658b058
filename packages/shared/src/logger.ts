import pino from 'pino';
import { trace } from '@opentelemetry/api';

/** Trace and span ids of the active span, so log lines join up with traces. */
export function traceFields(): { traceId?: string; spanId?: string } {
  const span = trace.getActiveSpan();
  if (!span) return {};
  const { traceId, spanId } = span.spanContext();
  return { traceId, spanId };
}

/**
 * Create the process logger. Levels are written as labels (`"level":"info"`)
 * for cluster log collectors, and errors logged under `err` keep their cause.
 */
export function createLogger(
  level: string = process.env.LOG_LEVEL ?? 'info',
  destination?: pino.DestinationStream,
) {
  const options: pino.LoggerOptions = {
    name: 'podsmith',
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.errWithCause,
    },
    mixin: traceFields,
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger();
