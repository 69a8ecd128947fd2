import {
  BillingModuleConfig,
  DEFAULT_BILLING_CONFIG,
  FulfillOrderHandler,
  ResolvedBillingConfig,
} from "../interfaces/billing.config.interface";

export class BillingConfigurationError extends Error {
  constructor(message: string) {
    super(`Invalid billing configuration: ${message}`);
    this.name = "BillingConfigurationError";
  }
}

function requireValue(value: string | undefined, name: string): string {
  if (!value || value.trim().length === 0) {
    throw new BillingConfigurationError(`${name} is required`);
  }
  return value;
}

/**
 * Merge the configuration with the defaults and validate it.
 */
export function resolveBillingConfig(config: BillingModuleConfig): ResolvedBillingConfig {
  const resolved: ResolvedBillingConfig = {
    ...config,
    useTrial: config.useTrial ?? DEFAULT_BILLING_CONFIG.useTrial,
    trialPeriodDays: config.trialPeriodDays ?? DEFAULT_BILLING_CONFIG.trialPeriodDays,
    timeout: config.timeout ?? DEFAULT_BILLING_CONFIG.timeout,
  };

  requireValue(resolved.secretKey, "secretKey");
  requireValue(resolved.webhookSigningSecret, "webhookSigningSecret");
  requireValue(resolved.defaultPriceId, "defaultPriceId");

  if (typeof resolved.fulfillOrder !== "function") {
    throw new BillingConfigurationError("fulfillOrder must be a function");
  }

  if (!Number.isInteger(resolved.trialPeriodDays) || resolved.trialPeriodDays < 1) {
    throw new BillingConfigurationError(
      `trialPeriodDays must be a positive integer, received ${resolved.trialPeriodDays}`,
    );
  }

  if (!Number.isInteger(resolved.timeout) || resolved.timeout < 1) {
    throw new BillingConfigurationError(`timeout must be a positive integer, received ${resolved.timeout}`);
  }

  return resolved;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return ["true", "1", "yes"].includes(value.toLowerCase());
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  return Number(value);
}

function optional(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Build the billing configuration from STRIPE_* environment variables.
 *
 * @example
 * ```typescript
 * BillingModule.forRoot(billingConfigFromEnv(async (session) => orders.fulfil(session)));
 * ```
 */
export function billingConfigFromEnv(
  fulfillOrder: FulfillOrderHandler,
  env: NodeJS.ProcessEnv = process.env,
): BillingModuleConfig {
  return {
    secretKey: env.STRIPE_SECRET_KEY ?? "",
    webhookSigningSecret: env.STRIPE_WEBHOOK_SECRET ?? "",
    defaultPriceId: env.STRIPE_DEFAULT_PRICE_ID ?? "",
    useTrial: parseBoolean(env.STRIPE_USE_TRIAL),
    trialPeriodDays: parseInteger(env.STRIPE_TRIAL_PERIOD_DAYS),
    fulfillOrder,
    accountId: optional(env.STRIPE_ACCOUNT_ID),
    projectId: optional(env.STRIPE_PROJECT_ID),
    portalReturnUrl: optional(env.STRIPE_PORTAL_RETURN_URL),
    portalConfigurationId: optional(env.STRIPE_PORTAL_CONFIGURATION_ID),
    timeout: parseInteger(env.STRIPE_TIMEOUT_MS),
  };
}
