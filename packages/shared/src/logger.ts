import { pino, type DestinationStream, type Logger } from 'pino';
import { trace } from '@opentelemetry/api';

export type { Logger };

// Secret payloads never reach a log line, even when a whole object is logged.
const REDACT_PATHS = ['data', 'stringData', '*.data', '*.stringData'];

export interface LoggerOptions {
  /** Value of the `service` field on every line (default: SERVICE_NAME or 'secret-sync') */
  service?: string;
  level?: string;
}

export function createLogger(opts: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const options = {
    name: 'secretsync',
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    base: { service: opts.service ?? process.env.SERVICE_NAME ?? 'secret-sync' },
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    mixin() {
      const span = trace.getActiveSpan();
      if (!span) return {};
      const ctx = span.spanContext();
      return { traceId: ctx.traceId, spanId: ctx.spanId };
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger();
