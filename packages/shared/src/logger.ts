import pino from 'pino';
import { trace } from '@opentelemetry/api';

/** Fields that carry key material or credentials; never written to the log. */
export const REDACTED_PATHS = ['privateKey', '*.privateKey', 'token', '*.token', 'pushToken', 'signature', '*.signature'];

export const logger = pino({
  name: 'relaypost',
  level: process.env.LOG_LEVEL ?? 'info',
  redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const ctx = span.spanContext();
    return {
      traceId: ctx.traceId,
      spanId: ctx.spanId,
    };
  },
});

export type Logger = typeof logger;
