export {createNoopLogger, createStructuredLogger, LogLevelSchema} from './logger';
export type {EventLevel, LogEventInput, LogLevel, LogSink, StructuredLogger, StructuredLoggerOptions} from './logger';
export {currentRequestContext, runWithRequestContext, scopeRequest} from './context';
export type {RequestLogContext, RequestScope} from './context';
export {sanitizeForLog} from './redaction';
