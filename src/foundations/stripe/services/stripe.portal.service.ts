import { BadRequestException, Injectable } from "@nestjs/common";
import Stripe from "stripe";
import { StripeService } from "./stripe.service";
import { HandleStripeErrors } from "../errors/stripe.errors";

/**
 * Stripe Portal Service
 *
 * Manages Stripe Customer Portal sessions. The Customer Portal allows customers to
 * manage their subscription, billing details, and payment methods through a Stripe-hosted page.
 *
 * The caller is responsible for checking that the customer belongs to the authenticated user.
 *
 * @example
 * ```typescript
 * const session = await stripePortalService.createPortalSession(
 *   'cus_abc123',
 *   'https://example.com/account'
 * );
 * // Redirect customer to: session.url
 * ```
 */
@Injectable()
export class StripePortalService {
  constructor(private readonly stripeService: StripeService) {}

  /**
   * Create a Customer Portal session
   *
   * @param stripeCustomerId - The Stripe customer ID
   * @param returnUrl - URL to redirect to when customer leaves the portal, defaults to the configured one
   * @throws {BadRequestException} If no return URL is given or configured
   * @throws {StripeProviderException} If session creation fails
   */
  @HandleStripeErrors()
  async createPortalSession(stripeCustomerId: string, returnUrl?: string): Promise<Stripe.BillingPortal.Session> {
    const resolvedReturnUrl = returnUrl || this.stripeService.getPortalReturnUrl();
    if (!resolvedReturnUrl) {
      throw new BadRequestException("A return URL is required to create a portal session");
    }

    const stripe = this.stripeService.getClient();

    const sessionParams: Stripe.BillingPortal.SessionCreateParams = {
      customer: stripeCustomerId,
      return_url: resolvedReturnUrl,
    };

    const configurationId = this.stripeService.getPortalConfigurationId();
    if (configurationId) {
      sessionParams.configuration = configurationId;
    }

    return stripe.billingPortal.sessions.create(sessionParams);
  }
}
