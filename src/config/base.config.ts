import { ConfigApiInterface } from "./interfaces/config.api.interface";
import { ConfigLoggingInterface } from "./interfaces/config.logging.interface";

export interface BaseConfigInterface {
  environment: string;
  api: ConfigApiInterface;
  logging: ConfigLoggingInterface;
}

/**
 * Process-level settings read once from the environment.
 *
 * Billing settings are not part of this object: they are passed explicitly to `BillingModule.forRoot()`.
 */
export const baseConfig: BaseConfigInterface = {
  environment: process.env.NODE_ENV ?? "development",
  api: {
    port: parseInt(process.env.API_PORT ?? "3000", 10),
    host: process.env.API_HOST ?? "0.0.0.0",
  },
  logging: {
    level: process.env.LOG_LEVEL ?? "info",
    pretty: process.env.NODE_ENV !== "production",
  },
};
