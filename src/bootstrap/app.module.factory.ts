import { DynamicModule, Module } from "@nestjs/common";
import { randomUUID } from "crypto";
import { IncomingMessage } from "http";
import { ClsModule, ClsService } from "nestjs-cls";
import { LOG_CONTEXT_KEY, LogContext } from "../core/logging/interfaces/logging.interface";
import { LoggingModule } from "../core/logging/logging.module";
import { BillingModule } from "../foundations/stripe/billing.module";
import { BootstrapOptions, isAsyncBillingOptions } from "./bootstrap.options";

@Module({})
export class AppModule {}

function requestIdFrom(req: IncomingMessage): string {
  const header = req.headers["x-request-id"];
  return typeof header === "string" && header.length > 0 ? header : randomUUID();
}

/**
 * Build the root module: request context, logging, billing and the host's own modules.
 */
export function createAppModule(options: BootstrapOptions): DynamicModule {
  const billingModule = isAsyncBillingOptions(options.billing)
    ? BillingModule.forRootAsync(options.billing)
    : BillingModule.forRoot(options.billing);

  return {
    module: AppModule,
    imports: [
      ClsModule.forRoot({
        global: true,
        middleware: {
          mount: true,
          generateId: true,
          idGenerator: (req: IncomingMessage) => requestIdFrom(req),
          setup: (cls: ClsService, req: IncomingMessage) => {
            const logContext: LogContext = {
              requestId: cls.getId(),
              method: req.method,
              url: req.url,
            };
            cls.set(LOG_CONTEXT_KEY, logContext);
          },
        },
      }),
      LoggingModule,
      billingModule,
      ...(options.appModules ?? []),
    ],
  };
}
