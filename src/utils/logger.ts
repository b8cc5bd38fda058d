/*
 * JSON-lines logger. Every line carries the run/endpoint context of the async
 * task that wrote it. Lines go to stderr so stdout stays free for command output.
 */
import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  runId?: string;
  endpoint?: string;
  spanId?: string;
  [key: string]: unknown;
}

type LogMeta = Record<string, unknown>;

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(levelPriority, value);

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let threshold = levelPriority[isLogLevel(envLevel) ? envLevel : 'info'];

const contextStorage = new AsyncLocalStorage<LogContext>();

// Error objects stringify to {}; keep what is useful
const serialize = (meta: LogMeta): LogMeta => {
  const result: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return result;
};

const write = (level: LogLevel, message: string, meta: LogMeta = {}): void => {
  if (levelPriority[level] < threshold) {
    return;
  }

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...contextStorage.getStore(),
    ...serialize(meta)
  });

  process.stderr.write(`${line}\n`);
};

export const setLogLevel = (level: LogLevel): void => {
  threshold = levelPriority[level];
};

export const getLogContext = (): LogContext => contextStorage.getStore() ?? {};

/**
 * Run `fn` with `context` layered over the current context
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T =>
  contextStorage.run({ ...getLogContext(), ...context }, fn);

export const generateRunId = (): string => randomUUID();

/**
 * Debug-level timing span
 */
export const startSpan = (name: string): { end: (meta?: LogMeta) => void } => {
  const spanId = randomUUID().slice(0, 8);
  const startTime = Date.now();

  write('debug', `Span started: ${name}`, { span: name, spanId });

  return {
    end: (meta?: LogMeta) => {
      write('debug', `Span ended: ${name}`, {
        span: name,
        spanId,
        durationMs: Date.now() - startTime,
        ...meta
      });
    }
  };
};

export const logger = {
  debug: (message: string, meta?: LogMeta) => write('debug', message, meta),
  info: (message: string, meta?: LogMeta) => write('info', message, meta),
  warn: (message: string, meta?: LogMeta) => write('warn', message, meta),
  error: (message: string, meta?: LogMeta) => write('error', message, meta)
};
