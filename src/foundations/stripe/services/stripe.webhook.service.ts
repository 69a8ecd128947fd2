import { Inject, Injectable } from "@nestjs/common";
import Stripe from "stripe";
import { AppLoggingService } from "../../../core/logging/services/logging.service";
import { WebhookSignatureException } from "../errors/stripe.errors";
import { BILLING_CONFIG, ResolvedBillingConfig } from "../interfaces/billing.config.interface";
import { WebhookAcknowledgement } from "../interfaces/webhook.interface";
import { StripeService } from "./stripe.service";

export const CHECKOUT_COMPLETED_EVENT = "checkout.session.completed";

/**
 * Stripe Webhook Service
 *
 * Verifies webhook deliveries and hands completed checkout sessions to the configured `fulfillOrder` callback.
 *
 * The acknowledgement is only produced once `fulfillOrder` has resolved. When the callback throws, the error
 * reaches the caller, the endpoint answers with a server error and Stripe delivers the event again.
 *
 * @example
 * ```typescript
 * const payload = request.rawBody; // Must be raw buffer, not parsed JSON
 * const signature = request.headers['stripe-signature'];
 * await webhookService.handleCheckoutWebhook(payload, signature);
 * ```
 */
@Injectable()
export class StripeWebhookService {
  constructor(
    private readonly stripeService: StripeService,
    @Inject(BILLING_CONFIG) private readonly config: ResolvedBillingConfig,
    private readonly logger: AppLoggingService,
  ) {}

  /**
   * Construct and verify a Stripe webhook event
   *
   * @param payload - Raw request body, exactly as received
   * @param signature - Stripe signature header value
   * @throws {WebhookSignatureException} If signature verification fails
   *
   * @remarks
   * The signature is checked before the payload is parsed.
   */
  constructEvent(payload: Buffer | string, signature: string): Stripe.Event {
    const stripe = this.stripeService.getClient();

    try {
      return stripe.webhooks.constructEvent(payload, signature, this.stripeService.getWebhookSecret());
    } catch (error) {
      if (error instanceof Stripe.errors.StripeSignatureVerificationError) {
        throw new WebhookSignatureException(error.message);
      }
      throw error;
    }
  }

  async handleCheckoutWebhook(
    payload: Buffer | undefined,
    signature: string | undefined,
  ): Promise<WebhookAcknowledgement> {
    if (!signature) {
      this.logger.logSecurityEvent("WebhookSignatureRejected", { reason: "missing stripe-signature header" });
      throw new WebhookSignatureException("missing stripe-signature header");
    }

    if (!payload) {
      this.logger.logSecurityEvent("WebhookSignatureRejected", { reason: "missing raw body" });
      throw new WebhookSignatureException("raw request body is not available");
    }

    let event: Stripe.Event;
    try {
      event = this.constructEvent(payload, signature);
    } catch (error) {
      if (error instanceof WebhookSignatureException) {
        this.logger.logSecurityEvent("WebhookSignatureRejected", { reason: error.message });
      }
      throw error;
    }

    if (event.type === CHECKOUT_COMPLETED_EVENT) {
      const session = event.data.object;

      this.logger.log(`Fulfilling checkout session ${session.id} (event ${event.id})`, StripeWebhookService.name);
      await this.config.fulfillOrder(session);
      this.logger.logBusinessEvent("CheckoutFulfilled", {
        eventId: event.id,
        sessionId: session.id,
        clientReferenceId: session.client_reference_id,
      });

      return { received: true, eventId: event.id, eventType: event.type, fulfilled: true };
    }

    this.logger.debug(`Unhandled webhook event type: ${event.type}`, StripeWebhookService.name);
    return { received: true, eventId: event.id, eventType: event.type, fulfilled: false };
  }
}
