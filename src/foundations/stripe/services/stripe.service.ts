import { Inject, Injectable, OnModuleInit } from "@nestjs/common";
import Stripe from "stripe";
import { BILLING_CONFIG, ResolvedBillingConfig } from "../interfaces/billing.config.interface";

/**
 * Stripe Service
 *
 * Owns the Stripe SDK client and exposes the parts of the billing configuration the Stripe services read.
 *
 * Every other service reaches Stripe through `getClient()`, so replacing this provider replaces the client.
 *
 * @example
 * ```typescript
 * constructor(private readonly stripeService: StripeService) {}
 *
 * async createCustomer() {
 *   const stripe = this.stripeService.getClient();
 *   return stripe.customers.create({ email: 'test@example.com' });
 * }
 * ```
 */
@Injectable()
export class StripeService implements OnModuleInit {
  private stripe: Stripe | null = null;

  constructor(@Inject(BILLING_CONFIG) private readonly config: ResolvedBillingConfig) {}

  /**
   * Create the Stripe client.
   *
   * The SDK's network retries are disabled: a failed call is reported to the caller as it is.
   */
  onModuleInit() {
    this.stripe = new Stripe(this.config.secretKey, {
      typescript: true,
      maxNetworkRetries: 0,
      timeout: this.config.timeout,
      stripeAccount: this.config.accountId,
    });
  }

  /**
   * @throws Error if the module has not been initialised yet
   */
  getClient(): Stripe {
    if (!this.stripe) {
      throw new Error("Stripe not initialized. The BillingModule has not finished initialising.");
    }
    return this.stripe;
  }

  isConfigured(): boolean {
    return !!this.stripe;
  }

  /**
   * Get the webhook signing secret (whsec_...) used to verify that webhook events come from Stripe
   */
  getWebhookSecret(): string {
    return this.config.webhookSigningSecret;
  }

  /**
   * Get the default return URL for Customer Portal sessions, if one is configured
   */
  getPortalReturnUrl(): string | undefined {
    return this.config.portalReturnUrl || undefined;
  }

  getPortalConfigurationId(): string | undefined {
    return this.config.portalConfigurationId || undefined;
  }
}
