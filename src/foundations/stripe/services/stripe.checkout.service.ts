import { Injectable } from "@nestjs/common";
import Stripe from "stripe";
import { StripeService } from "./stripe.service";
import { HandleStripeErrors } from "../errors/stripe.errors";

/**
 * Stripe Checkout Service
 *
 * Creates hosted Checkout Sessions for one-time purchases. The client redirects to `session.url`;
 * the purchase is fulfilled when the `checkout.session.completed` webhook arrives.
 *
 * @example
 * ```typescript
 * const session = await stripeCheckoutService.createCheckoutSession({
 *   clientReferenceId: 'order_42',
 *   stripeCustomerId: 'cus_abc123',
 *   priceId: 'price_ebook',
 *   successUrl: 'https://example.com/thanks',
 *   cancelUrl: 'https://example.com/cart',
 * });
 * ```
 */
@Injectable()
export class StripeCheckoutService {
  constructor(private readonly stripeService: StripeService) {}

  /**
   * @throws {StripeProviderException} If session creation fails
   */
  @HandleStripeErrors()
  async createCheckoutSession(params: {
    clientReferenceId: string;
    stripeCustomerId: string;
    priceId: string;
    successUrl: string;
    cancelUrl: string;
  }): Promise<Stripe.Checkout.Session> {
    const stripe = this.stripeService.getClient();

    return stripe.checkout.sessions.create({
      mode: "payment",
      client_reference_id: params.clientReferenceId,
      customer: params.stripeCustomerId,
      line_items: [{ price: params.priceId, quantity: 1 }],
      success_url: params.successUrl,
      cancel_url: params.cancelUrl,
    });
  }
}
