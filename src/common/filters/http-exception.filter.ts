import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Optional } from "@nestjs/common";
import { FastifyReply, FastifyRequest } from "fastify";
import { baseConfig } from "../../config/base.config";
import { AppLoggingService } from "../../core/logging/services/logging.service";

const FILTER_CONTEXT = "HttpExceptionFilter";
const HIDDEN_SERVER_ERROR = "An internal error occurred. Please try again later.";

export interface ErrorEntry {
  status: string;
  title: string;
  detail: string;
  type?: string;
  code?: string;
  meta: {
    timestamp: string;
    path: string;
    method: string;
    requestId: string;
  };
}

export interface ErrorResponseBody {
  message: string;
  errors: ErrorEntry[];
}

interface DescribedException {
  status: number;
  detail: string;
  type?: string;
  code?: string;
  validationErrors?: string[];
}

function isProduction(): boolean {
  return baseConfig.environment === "production";
}

function stringField(response: object, field: string): string | undefined {
  const value: unknown = Reflect.get(response, field);
  return typeof value === "string" ? value : undefined;
}

/**
 * Status, client-facing detail and provider error fields of a thrown value.
 *
 * ValidationPipe rejections carry an array of messages; StripeProviderException carries the Stripe `type` and `code`.
 */
function describeException(exception: unknown): DescribedException {
  if (!(exception instanceof HttpException)) {
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, detail: "Internal server error" };
  }

  const status = exception.getStatus();
  const response = exception.getResponse();
  if (typeof response === "string") return { status, detail: response };

  const message: unknown = Reflect.get(response, "message");
  if (Array.isArray(message)) {
    const validationErrors = message.filter((entry): entry is string => typeof entry === "string");
    return { status, detail: validationErrors.join(", "), validationErrors };
  }

  return {
    status,
    detail: typeof message === "string" ? message : exception.message,
    type: stringField(response, "type"),
    code: stringField(response, "code"),
  };
}

/**
 * Renders every error as `{ message, errors: [...] }` and logs it: 4xx as warnings, everything else as errors.
 * 5xx details are hidden from clients in production.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(@Optional() private readonly logger?: AppLoggingService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    const described = describeException(exception);
    const requestId = this.logger?.getRequestContext()?.requestId || request.id;

    this.log(exception, described, request, requestId);

    const detail = described.status >= 500 && isProduction() ? HIDDEN_SERVER_ERROR : described.detail;
    const entry: ErrorEntry = {
      status: String(described.status),
      title: HttpStatus[described.status] || "Unknown Error",
      detail,
      meta: {
        timestamp: new Date().toISOString(),
        path: request.url,
        method: request.method,
        requestId,
      },
    };
    if (described.type) entry.type = described.type;
    if (described.code) entry.code = described.code;

    const body: ErrorResponseBody = { message: detail, errors: [entry] };
    reply.status(described.status).send(body);
  }

  private log(exception: unknown, described: DescribedException, request: FastifyRequest, requestId: string): void {
    if (!this.logger) return;

    const summary = `${described.status} - ${request.method} ${request.url}`;
    const metadata = {
      status: described.status,
      errorName: exception instanceof Error ? exception.name : "UnknownError",
      errorType: described.type,
      errorCode: described.code,
      requestId,
      ip: request.ip,
      userAgent: request.headers["user-agent"],
    };

    if (described.validationErrors) {
      const list = described.validationErrors.map((entry) => `  - ${entry}`).join("\n");
      this.logger.warn(`Validation Error: ${summary}\n\nValidation Errors:\n${list}`, FILTER_CONTEXT, {
        ...metadata,
        validationErrors: described.validationErrors,
      });
      return;
    }

    if (described.status < 500) {
      this.logger.warn(`Client Error: ${summary}`, FILTER_CONTEXT, metadata);
      return;
    }

    this.logger.error(
      `${exception instanceof HttpException ? "Server Error" : "Unhandled Exception"}: ${summary}`,
      exception instanceof Error ? exception : String(exception),
      FILTER_CONTEXT,
      metadata,
    );
  }
}
