import { describe, it, expect } from "vitest";
import { BillingConfigurationError, billingConfigFromEnv, resolveBillingConfig } from "../billing.config";
import { BillingModuleConfig } from "../../interfaces/billing.config.interface";

const fulfillOrder = () => undefined;

const baseConfig: BillingModuleConfig = {
  secretKey: "sk_test_placeholder",
  webhookSigningSecret: "whsec_test_secret",
  defaultPriceId: "price_free",
  fulfillOrder,
};

describe("resolveBillingConfig", () => {
  it("should apply the defaults", () => {
    const resolved = resolveBillingConfig(baseConfig);

    expect(resolved.useTrial).toBe(false);
    expect(resolved.trialPeriodDays).toBe(14);
    expect(resolved.timeout).toBe(30000);
    expect(resolved.fulfillOrder).toBe(fulfillOrder);
  });

  it("should keep explicit values", () => {
    const resolved = resolveBillingConfig({ ...baseConfig, useTrial: true, trialPeriodDays: 30, timeout: 5000 });

    expect(resolved.useTrial).toBe(true);
    expect(resolved.trialPeriodDays).toBe(30);
    expect(resolved.timeout).toBe(5000);
  });

  it.each(["secretKey", "webhookSigningSecret", "defaultPriceId"] as const)("should require %s", (key) => {
    expect(() => resolveBillingConfig({ ...baseConfig, [key]: "  " })).toThrow(
      `Invalid billing configuration: ${key} is required`,
    );
  });

  it("should reject a trial length that is not a positive integer", () => {
    expect(() => resolveBillingConfig({ ...baseConfig, trialPeriodDays: 0 })).toThrow(
      "Invalid billing configuration: trialPeriodDays must be a positive integer, received 0",
    );
    expect(() => resolveBillingConfig({ ...baseConfig, trialPeriodDays: 1.5 })).toThrow(BillingConfigurationError);
  });

  it("should reject a timeout that is not a number", () => {
    expect(() => resolveBillingConfig({ ...baseConfig, timeout: Number("soon") })).toThrow(
      "Invalid billing configuration: timeout must be a positive integer, received NaN",
    );
  });
});

describe("billingConfigFromEnv", () => {
  it("should read every STRIPE_ variable", () => {
    const config = billingConfigFromEnv(fulfillOrder, {
      STRIPE_SECRET_KEY: "sk_test_placeholder",
      STRIPE_WEBHOOK_SECRET: "whsec_test_secret",
      STRIPE_DEFAULT_PRICE_ID: "price_pro",
      STRIPE_USE_TRIAL: "yes",
      STRIPE_TRIAL_PERIOD_DAYS: "30",
      STRIPE_ACCOUNT_ID: "acct_test123",
      STRIPE_PROJECT_ID: "proj-billing-demo",
      STRIPE_PORTAL_RETURN_URL: "https://example.com/account",
      STRIPE_PORTAL_CONFIGURATION_ID: "bpc_test123",
      STRIPE_TIMEOUT_MS: "10000",
    });

    expect(config).toEqual({
      secretKey: "sk_test_placeholder",
      webhookSigningSecret: "whsec_test_secret",
      defaultPriceId: "price_pro",
      useTrial: true,
      trialPeriodDays: 30,
      fulfillOrder,
      accountId: "acct_test123",
      projectId: "proj-billing-demo",
      portalReturnUrl: "https://example.com/account",
      portalConfigurationId: "bpc_test123",
      timeout: 10000,
    });
  });

  it("should leave unset and empty variables to the defaults", () => {
    const resolved = resolveBillingConfig(
      billingConfigFromEnv(fulfillOrder, {
        STRIPE_SECRET_KEY: "sk_test_placeholder",
        STRIPE_WEBHOOK_SECRET: "whsec_test_secret",
        STRIPE_DEFAULT_PRICE_ID: "price_free",
        STRIPE_USE_TRIAL: "",
        STRIPE_ACCOUNT_ID: "",
      }),
    );

    expect(resolved.useTrial).toBe(false);
    expect(resolved.trialPeriodDays).toBe(14);
    expect(resolved.accountId).toBeUndefined();
  });

  it("should read any other trial flag as false", () => {
    expect(billingConfigFromEnv(fulfillOrder, { STRIPE_USE_TRIAL: "off" }).useTrial).toBe(false);
  });

  it("should fail validation when the secret key is missing", () => {
    const config = billingConfigFromEnv(fulfillOrder, {
      STRIPE_WEBHOOK_SECRET: "whsec_test_secret",
      STRIPE_DEFAULT_PRICE_ID: "price_free",
    });

    expect(() => resolveBillingConfig(config)).toThrow("Invalid billing configuration: secretKey is required");
  });
});
