/**
 * Bootstrap utilities
 *
 * ```typescript
 * // main.ts
 * import { bootstrap, billingConfigFromEnv } from "nestjs-stripe-billing";
 *
 * bootstrap({
 *   billing: billingConfigFromEnv(async (session) => fulfilOrder(session)),
 *   appModules: [OrdersModule],
 * });
 * ```
 */
export {
  applicationOptions,
  bootstrap,
  configureApplication,
  defaultFastifyOptions,
  registerJsonBodyParser,
} from "./bootstrap";
export type { BootstrapOptions } from "./bootstrap.options";
export { isAsyncBillingOptions } from "./bootstrap.options";
export { AppModule, createAppModule } from "./app.module.factory";
