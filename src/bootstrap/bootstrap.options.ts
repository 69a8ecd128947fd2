import { ModuleMetadata } from "@nestjs/common";
import { BillingModuleAsyncOptions, BillingModuleConfig } from "../foundations/stripe/interfaces/billing.config.interface";

export interface BootstrapOptions {
  /**
   * Billing configuration, or async options resolving it
   */
  billing: BillingModuleConfig | BillingModuleAsyncOptions;

  /**
   * Extra modules of the host application
   */
  appModules?: NonNullable<ModuleMetadata["imports"]>;

  /**
   * Port to listen on, defaults to API_PORT
   */
  port?: number;
}

export function isAsyncBillingOptions(
  billing: BillingModuleConfig | BillingModuleAsyncOptions,
): billing is BillingModuleAsyncOptions {
  return "useFactory" in billing;
}
