import {LogEventSchema, type LogEvent} from '@adhoc-pki/schemas';
import {z} from 'zod';

import {currentRequestContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type EventLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: Number.POSITIVE_INFINITY
};

/**
 * What a call site reports. Correlation ids always come from the request
 * context; labels, route and method fall back to it when omitted.
 */
export const LogEventInputSchema = LogEventSchema.pick({
  event: true,
  component: true,
  message: true,
  arch_label: true,
  cert_label: true,
  reason_code: true,
  duration_ms: true,
  status_code: true,
  route: true,
  method: true
}).extend({
  metadata: z.record(z.string(), z.unknown()).optional()
});

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

export type LogSink = (line: string, level: EventLevel) => void;

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  sink?: LogSink;
  extraSensitiveKeys?: string[];
};

export type StructuredLogger = Record<EventLevel, (input: LogEventInput) => void>;

const processSink: LogSink = (line, level) => {
  const stream = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
};

const definedEntries = (fields: Record<string, unknown>) =>
  Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const threshold = LEVEL_RANK[LogLevelSchema.parse(options.level)];
  const service = z.string().min(1).parse(options.service);
  const env = z.string().min(1).parse(options.env);
  const now = options.now ?? (() => new Date());
  const sink = options.sink ?? processSink;
  const extraSensitiveKeys = options.extraSensitiveKeys ?? [];

  const toEnvelope = (level: EventLevel, input: LogEventInput): LogEvent => {
    const {metadata, ...fields} = LogEventInputSchema.parse(input);
    const context = currentRequestContext();
    const sanitized = sanitizeForLog({value: metadata ?? {}, extraSensitiveKeys});

    return LogEventSchema.parse(
      definedEntries({
        ts: now().toISOString(),
        level,
        service,
        env,
        correlation_id: context?.correlation_id ?? 'n/a',
        request_id: context?.request_id ?? 'n/a',
        route: context?.route,
        method: context?.method,
        arch_label: context?.arch_label,
        cert_label: context?.cert_label,
        ...definedEntries(fields),
        metadata: isRecord(sanitized) ? sanitized : {}
      })
    );
  };

  const emitter = (level: EventLevel) => (input: LogEventInput) => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }

    try {
      sink(JSON.stringify(toEnvelope(level, input)), level);
    } catch {
      // a malformed event or a broken sink never fails the caller
    }
  };

  return {
    debug: emitter('debug'),
    info: emitter('info'),
    warn: emitter('warn'),
    error: emitter('error'),
    fatal: emitter('fatal')
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
