import { Injectable, LoggerService, Optional } from "@nestjs/common";
import { ClsService } from "nestjs-cls";
import pino, { Logger } from "pino";
import pinoPretty from "pino-pretty";
import { baseConfig } from "../../../config/base.config";
import { ContextLogger, LOG_CONTEXT_KEY, LogContext, LogMetadata } from "../interfaces/logging.interface";

type PinoLevel = "info" | "error" | "warn" | "debug" | "trace" | "fatal";

function formatMessage(message: unknown): string {
  return typeof message === "string" ? message : JSON.stringify(message);
}

function withStack(message: string, error: Error): string {
  return error.stack ? `${message}\nStack: ${error.stack}` : `${message}\nStack: ${error.name}: ${error.message}`;
}

/**
 * Pino-backed logger that merges the current request context (from CLS) into every entry.
 */
class PinoContextLogger implements ContextLogger {
  private readonly children = new Map<string, ContextLogger>();

  constructor(
    protected readonly pinoLogger: Logger,
    protected readonly cls?: ClsService,
  ) {}

  log(message: unknown, context?: string, meta?: LogMetadata): void {
    this.write("info", formatMessage(message), context, meta);
  }

  error(message: unknown, errorOrTrace?: Error | string, context?: string, meta?: LogMetadata): void {
    if (errorOrTrace instanceof Error) {
      this.write("error", withStack(formatMessage(message), errorOrTrace), context, {
        ...meta,
        error: errorOrTrace.message,
        errorName: errorOrTrace.name,
      });
      return;
    }

    this.write("error", formatMessage(message), context, errorOrTrace ? { ...meta, trace: errorOrTrace } : meta);
  }

  warn(message: unknown, context?: string, meta?: LogMetadata): void {
    this.write("warn", formatMessage(message), context, meta);
  }

  debug(message: unknown, context?: string, meta?: LogMetadata): void {
    this.write("debug", formatMessage(message), context, meta);
  }

  verbose(message: unknown, context?: string, meta?: LogMetadata): void {
    this.write("trace", formatMessage(message), context, meta);
  }

  fatal(message: unknown, error?: Error, context?: string, meta?: LogMetadata): void {
    if (error) {
      this.write("fatal", withStack(formatMessage(message), error), context, {
        ...meta,
        error: error.message,
        errorName: error.name,
      });
      return;
    }

    this.write("fatal", formatMessage(message), context, meta);
  }

  trace(message: unknown, context?: string, meta?: LogMetadata): void {
    this.write("trace", formatMessage(message), context, meta);
  }

  logWithContext(message: string, context: string, meta?: LogMetadata): void {
    this.write("info", message, context, meta);
  }

  errorWithContext(message: string, error: Error | undefined, context: string, meta?: LogMetadata): void {
    this.error(message, error, context, meta);
  }

  createChildLogger(context: string, meta?: LogMetadata): ContextLogger {
    const key = `${context}:${JSON.stringify(meta ?? {})}`;
    const cached = this.children.get(key);
    if (cached) return cached;

    const child = new PinoContextLogger(this.pinoLogger.child({ context, ...meta }), this.cls);
    this.children.set(key, child);
    return child;
  }

  getRequestContext(): LogContext | undefined {
    return this.cls?.get(LOG_CONTEXT_KEY);
  }

  private write(level: PinoLevel, message: string, context?: string, meta?: LogMetadata): void {
    const entry: LogMetadata = {
      ...(context ? { context } : {}),
      ...this.getRequestContext(),
      ...meta,
    };

    this.pinoLogger[level](entry, message);
  }
}

/**
 * Application logger.
 *
 * Used as the Nest application logger and injected wherever a service logs. Every entry carries the
 * request id, method and URL stored in CLS by the bootstrap middleware, when there is one.
 */
@Injectable()
export class AppLoggingService extends PinoContextLogger implements LoggerService {
  constructor(@Optional() cls?: ClsService) {
    super(
      pino(
        {
          level: baseConfig.logging.level,
          timestamp: pino.stdTimeFunctions.isoTime,
          base: null,
        },
        baseConfig.logging.pretty ? pinoPretty({ colorize: true, singleLine: true }) : undefined,
      ),
      cls,
    );
  }

  setRequestContext(logContext: LogContext): void {
    this.cls?.set(LOG_CONTEXT_KEY, logContext);
  }

  clearRequestContext(): void {
    this.cls?.set(LOG_CONTEXT_KEY, undefined);
  }

  logHttpRequest(method: string, url: string, statusCode: number, responseTimeMs: number, clientIp?: string): void {
    this.log(`${method} ${url} - ${statusCode} (${responseTimeMs}ms)`, "HTTP", {
      httpMethod: method,
      httpUrl: url,
      httpStatusCode: statusCode,
      responseTimeMs,
      clientIp,
    });
  }

  logHttpError(method: string, url: string, error: Error, responseTimeMs: number, clientIp?: string): void {
    this.error(`${method} ${url} - ERROR (${responseTimeMs}ms)`, error, "HTTP", {
      httpMethod: method,
      httpUrl: url,
      responseTimeMs,
      clientIp,
    });
  }

  logBusinessEvent(event: string, data: LogMetadata = {}): void {
    this.log(`Business Event: ${event}`, "BUSINESS", data);
  }

  logSecurityEvent(event: string, data: LogMetadata = {}): void {
    this.log(`Security Event: ${event}`, "SECURITY", { ...data, securityEvent: true });
  }
}
