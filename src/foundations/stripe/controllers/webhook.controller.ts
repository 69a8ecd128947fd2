import { Controller, Headers, HttpStatus, Post, RawBodyRequest, Req, Res } from "@nestjs/common";
import { FastifyReply, FastifyRequest } from "fastify";
import { StripeWebhookService } from "../services/stripe.webhook.service";
import { billingEndpoint } from "./billing.controller";

const webhooksEndpoint = `${billingEndpoint}/webhooks`;

/**
 * Route whose body must reach the handler unparsed.
 */
export const stripeWebhookRoute = `/${webhooksEndpoint}/stripe`;

/**
 * Receives Stripe webhook deliveries. Requires the application to keep the raw body of this route unparsed,
 * see `configureApplication`.
 */
@Controller(webhooksEndpoint)
export class WebhookController {
  constructor(private readonly stripeWebhookService: StripeWebhookService) {}

  /**
   * POST /billing/webhooks/stripe - Answers 200 with the acknowledgement once the event has been handled,
   * 401 on a bad signature
   */
  @Post("stripe")
  async handleStripeWebhook(
    @Req() request: RawBodyRequest<FastifyRequest>,
    @Headers("stripe-signature") signature: string | undefined,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const acknowledgement = await this.stripeWebhookService.handleCheckoutWebhook(request.rawBody, signature);
    reply.status(HttpStatus.OK).send(acknowledgement);
  }
}
