import { vi, describe, it, expect, beforeEach, afterEach } from "vitest";
import { Test, TestingModule } from "@nestjs/testing";
import { ClsService } from "nestjs-cls";
import { AppLoggingService } from "../logging.service";

const { mockPinoLogger } = vi.hoisted(() => ({
  mockPinoLogger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  },
}));

vi.mock("pino", () => {
  const mockPino = Object.assign(
    vi.fn(() => mockPinoLogger),
    { stdTimeFunctions: { isoTime: vi.fn() } },
  );
  return { default: mockPino };
});

vi.mock("pino-pretty", () => ({
  default: vi.fn(() => ({ write: vi.fn() })),
}));

vi.mock("../../../../config/base.config", () => ({
  baseConfig: {
    environment: "test",
    logging: {
      level: "debug",
      pretty: false,
    },
  },
}));

const createMockClsService = (store: Record<string, unknown>) => ({
  get: vi.fn((key: string) => store[key]),
  set: vi.fn((key: string, value: unknown) => {
    store[key] = value;
  }),
});

describe("AppLoggingService", () => {
  let service: AppLoggingService;
  let clsStore: Record<string, unknown>;
  let mockClsService: ReturnType<typeof createMockClsService>;

  beforeEach(async () => {
    vi.clearAllMocks();

    mockPinoLogger.child.mockReturnValue({
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
      trace: vi.fn(),
      fatal: vi.fn(),
      child: vi.fn(),
    });

    clsStore = {};

    mockClsService = createMockClsService(clsStore);

    const module: TestingModule = await Test.createTestingModule({
      providers: [AppLoggingService, { provide: ClsService, useValue: mockClsService }],
    }).compile();

    service = module.get<AppLoggingService>(AppLoggingService);
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe("log", () => {
    it("should log info level message", () => {
      service.log("Test message", "TestContext");

      const [context, message] = mockPinoLogger.info.mock.calls[0];
      expect(message).toBe("Test message");
      expect(context.context).toBe("TestContext");
    });

    it("should log object messages as JSON string", () => {
      const messageObj = { key: "value", nested: { data: 123 } };
      service.log(messageObj, "TestContext");

      const [, message] = mockPinoLogger.info.mock.calls[0];
      expect(message).toBe(JSON.stringify(messageObj));
    });

    it("should include metadata in context", () => {
      service.log("Test message", "TestContext", { extra: "data" });

      const [context] = mockPinoLogger.info.mock.calls[0];
      expect(context.extra).toBe("data");
    });
  });

  describe("error", () => {
    it("should log error level message", () => {
      service.error("Error occurred", undefined, "TestContext");

      const [, message] = mockPinoLogger.error.mock.calls[0];
      expect(message).toBe("Error occurred");
    });

    it("should include Error object details", () => {
      const error = new Error("Test error");
      service.error("Something failed", error, "TestContext");

      const [context, message] = mockPinoLogger.error.mock.calls[0];
      expect(context.error).toBe("Test error");
      expect(context.errorName).toBe("Error");
      expect(message).toContain("Something failed");
      expect(message).toContain("Stack:");
    });

    it("should handle legacy trace string signature", () => {
      service.error("Error occurred", "trace-id-123", "TestContext");

      const [context] = mockPinoLogger.error.mock.calls[0];
      expect(context.trace).toBe("trace-id-123");
    });
  });

  describe("warn and debug", () => {
    it("should log warn level message", () => {
      service.warn("Warning message", "TestContext");

      const [, message] = mockPinoLogger.warn.mock.calls[0];
      expect(message).toBe("Warning message");
    });

    it("should log debug level message", () => {
      service.debug({ debug: true }, "TestContext");

      const [, message] = mockPinoLogger.debug.mock.calls[0];
      expect(message).toBe('{"debug":true}');
    });

    it("should map verbose to trace", () => {
      service.verbose("Verbose message", "TestContext");

      const [, message] = mockPinoLogger.trace.mock.calls[0];
      expect(message).toBe("Verbose message");
    });
  });

  describe("fatal", () => {
    it("should include Error object details", () => {
      const error = new Error("Critical failure");
      service.fatal("System crashed", error, "TestContext");

      const [context, message] = mockPinoLogger.fatal.mock.calls[0];
      expect(context.error).toBe("Critical failure");
      expect(context.errorName).toBe("Error");
      expect(message).toContain("System crashed");
      expect(message).toContain("Stack:");
    });
  });

  describe("errorWithContext", () => {
    it("should log error with context enrichment", () => {
      const error = new Error("Contextual error");
      service.errorWithContext("Error with context", error, "TestContext", { errorCode: "E001" });

      const [context, message] = mockPinoLogger.error.mock.calls[0];
      expect(message).toContain("Error with context");
      expect(context.error).toBe("Contextual error");
      expect(context.errorCode).toBe("E001");
    });

    it("should handle missing error", () => {
      service.errorWithContext("Error without exception", undefined, "TestContext");

      const [, message] = mockPinoLogger.error.mock.calls[0];
      expect(message).toBe("Error without exception");
    });
  });

  describe("Request Context Management", () => {
    it("should set request context in CLS", () => {
      const logContext = { requestId: "req-123", method: "POST", url: "/billing/checkout-sessions" };

      service.setRequestContext(logContext);

      expect(mockClsService.set).toHaveBeenCalledWith("logContext", logContext);
    });

    it("should get request context from CLS", () => {
      clsStore["logContext"] = { requestId: "req-123" };

      expect(service.getRequestContext()).toEqual({ requestId: "req-123" });
    });

    it("should clear request context", () => {
      service.clearRequestContext();

      expect(mockClsService.set).toHaveBeenCalledWith("logContext", undefined);
    });

    it("should include request context in logs", () => {
      clsStore["logContext"] = { requestId: "req-789", url: "/billing/webhooks/stripe" };

      service.log("Message with context", "TestContext");

      const [context] = mockPinoLogger.info.mock.calls[0];
      expect(context.requestId).toBe("req-789");
      expect(context.url).toBe("/billing/webhooks/stripe");
    });
  });

  describe("createChildLogger", () => {
    it("should create a child logger with context", () => {
      const childLogger = service.createChildLogger("ChildContext", { module: "test" });

      expect(mockPinoLogger.child).toHaveBeenCalledWith({
        context: "ChildContext",
        module: "test",
      });
      expect(childLogger.logWithContext).toBeDefined();
    });

    it("should cache child loggers with same context", () => {
      service.createChildLogger("SameContext", { key: "value" });
      service.createChildLogger("SameContext", { key: "value" });

      expect(mockPinoLogger.child).toHaveBeenCalledTimes(1);
    });

    it("should create new child for different context", () => {
      service.createChildLogger("Context1", { key: "value1" });
      service.createChildLogger("Context2", { key: "value2" });

      expect(mockPinoLogger.child).toHaveBeenCalledTimes(2);
    });
  });

  describe("HTTP Logging Utilities", () => {
    it("should log HTTP request", () => {
      service.logHttpRequest("POST", "/billing/portal-sessions", 201, 150, "192.168.1.1");

      const [context, message] = mockPinoLogger.info.mock.calls[0];
      expect(message).toBe("POST /billing/portal-sessions - 201 (150ms)");
      expect(context.httpMethod).toBe("POST");
      expect(context.httpUrl).toBe("/billing/portal-sessions");
      expect(context.httpStatusCode).toBe(201);
      expect(context.responseTimeMs).toBe(150);
      expect(context.clientIp).toBe("192.168.1.1");
      expect(context.context).toBe("HTTP");
    });

    it("should log HTTP error", () => {
      const error = new Error("Connection refused");
      service.logHttpError("POST", "/api/data", error, 500, "10.0.0.1");

      const [context, message] = mockPinoLogger.error.mock.calls[0];
      expect(message).toContain("POST /api/data - ERROR (500ms)");
      expect(context.httpMethod).toBe("POST");
      expect(context.error).toBe("Connection refused");
    });
  });

  describe("Business and Security Event Logging", () => {
    it("should log business event", () => {
      service.logBusinessEvent("CustomerProvisioned", { customerId: "cus_123", priceId: "price_pro" });

      const [context, message] = mockPinoLogger.info.mock.calls[0];
      expect(message).toBe("Business Event: CustomerProvisioned");
      expect(context.context).toBe("BUSINESS");
      expect(context.customerId).toBe("cus_123");
      expect(context.priceId).toBe("price_pro");
    });

    it("should log security event with security flag", () => {
      service.logSecurityEvent("WebhookSignatureRejected", { ip: "10.0.0.1" });

      const [context, message] = mockPinoLogger.info.mock.calls[0];
      expect(message).toBe("Security Event: WebhookSignatureRejected");
      expect(context.context).toBe("SECURITY");
      expect(context.securityEvent).toBe(true);
      expect(context.ip).toBe("10.0.0.1");
    });
  });
});
