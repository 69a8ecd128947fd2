import { ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import { FastifyInstance, FastifyRequest, RawServerDefault } from "fastify";
import { HttpExceptionFilter } from "../common/filters/http-exception.filter";
import { baseConfig } from "../config/base.config";
import { AppLoggingService } from "../core/logging/services/logging.service";
import { stripeWebhookRoute } from "../foundations/stripe/controllers/webhook.controller";
import { createAppModule } from "./app.module.factory";
import { BootstrapOptions } from "./bootstrap.options";

export const defaultFastifyOptions = {
  bodyLimit: 1024 * 1024,
  trustProxy: true,
};

/**
 * Options for `NestFactory.create`. Nest's own body parsers are off: `configureApplication` registers the JSON parser.
 */
export const applicationOptions = {
  rawBody: true,
  bodyParser: false,
};

type BodyParserDone = (error: Error | null, body?: unknown) => void;
type JsonBodyParser = (request: FastifyRequest, body: string, done: BodyParserDone) => void;

/**
 * JSON parser that leaves the bodies of the given routes as Buffers.
 *
 * Nest stores every JSON body in `request.rawBody`; on the listed routes it is not parsed at all,
 * so a webhook payload is only read once its signature has been verified.
 */
export function registerJsonBodyParser(
  app: NestFastifyApplication,
  adapter: FastifyAdapter,
  unparsedRoutes: string[] = [stripeWebhookRoute],
): void {
  const parseJson: JsonBodyParser = adapter.getInstance<FastifyInstance>().getDefaultJsonParser("error", "error");

  app.useBodyParser<RawServerDefault>(
    "application/json",
    { bodyLimit: defaultFastifyOptions.bodyLimit },
    (request: FastifyRequest, body: Buffer, done: BodyParserDone): void => {
      if (unparsedRoutes.includes(request.routeOptions.url ?? "")) {
        done(null, body);
        return;
      }
      parseJson(request, body.toString("utf8"), done);
    },
  );
}

/**
 * Install the JSON body parser, the logger, the exception filter, request validation and HTTP request logging.
 *
 * The application must have been created with `applicationOptions`.
 */
export function configureApplication(app: NestFastifyApplication, adapter: FastifyAdapter): NestFastifyApplication {
  registerJsonBodyParser(app, adapter);

  const logger = app.get(AppLoggingService);
  app.useLogger(logger);
  app.useGlobalFilters(new HttpExceptionFilter(logger));
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  adapter
    .getInstance<FastifyInstance>()
    .addHook("onResponse", (request, reply, done) => {
      logger.logHttpRequest(request.method, request.url, reply.statusCode, Math.round(reply.elapsedTime), request.ip);
      done();
    });

  return app;
}

/**
 * Create and start the HTTP application.
 *
 * The raw request body is kept so that webhook signatures can be verified.
 */
export async function bootstrap(options: BootstrapOptions): Promise<NestFastifyApplication> {
  const adapter = new FastifyAdapter(defaultFastifyOptions);
  const app = await NestFactory.create<NestFastifyApplication>(createAppModule(options), adapter, {
    ...applicationOptions,
    bufferLogs: true,
  });
  configureApplication(app, adapter);

  const port = options.port ?? baseConfig.api.port;
  await app.listen(port, baseConfig.api.host);
  app.get(AppLoggingService).log(`Billing API listening on ${baseConfig.api.host}:${port}`, "Bootstrap");

  return app;
}
