export interface LogContext {
  requestId?: string;
  userId?: string;
  method?: string;
  url?: string;
  ip?: string;
  [key: string]: unknown;
}

export type LogMetadata = Record<string, unknown>;

export interface ContextLogger {
  log(message: unknown, context?: string, meta?: LogMetadata): void;
  error(message: unknown, errorOrTrace?: Error | string, context?: string, meta?: LogMetadata): void;
  warn(message: unknown, context?: string, meta?: LogMetadata): void;
  debug(message: unknown, context?: string, meta?: LogMetadata): void;
  verbose(message: unknown, context?: string, meta?: LogMetadata): void;
  fatal(message: unknown, error?: Error, context?: string, meta?: LogMetadata): void;
  trace(message: unknown, context?: string, meta?: LogMetadata): void;
  logWithContext(message: string, context: string, meta?: LogMetadata): void;
  errorWithContext(message: string, error: Error | undefined, context: string, meta?: LogMetadata): void;
  createChildLogger(context: string, meta?: LogMetadata): ContextLogger;
}

export const LOG_CONTEXT_KEY = "logContext";
