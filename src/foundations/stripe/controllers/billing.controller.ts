import { Body, Controller, HttpStatus, Post, Res } from "@nestjs/common";
import { FastifyReply } from "fastify";
import { CreateCheckoutSessionDTO } from "../dtos/create-checkout-session.dto";
import { CreatePortalSessionDTO } from "../dtos/create-portal-session.dto";
import { ProvisionCustomerDTO } from "../dtos/provision-customer.dto";
import { BillingFailure, isProvisioningFailure } from "../interfaces/provisioning.interface";
import { ProvisioningService } from "../services/provisioning.service";
import { StripeCheckoutService } from "../services/stripe.checkout.service";
import { StripePortalService } from "../services/stripe.portal.service";

export const billingEndpoint = "billing";

/**
 * Status reported for a failed provisioning: Stripe's own status when it is an HTTP error status,
 * 502 otherwise.
 */
export function provisioningFailureStatus(failure: BillingFailure): number {
  if (failure.statusCode !== undefined && failure.statusCode >= 400 && failure.statusCode < 600) {
    return failure.statusCode;
  }
  return HttpStatus.BAD_GATEWAY;
}

@Controller(billingEndpoint)
export class BillingController {
  constructor(
    private readonly provisioningService: ProvisioningService,
    private readonly stripePortalService: StripePortalService,
    private readonly stripeCheckoutService: StripeCheckoutService,
  ) {}

  /**
   * POST /billing/provisioning - Create a customer and its default subscription
   */
  @Post("provisioning")
  async provision(@Res() reply: FastifyReply, @Body() body: ProvisionCustomerDTO): Promise<void> {
    const result = await this.provisioningService.provision({
      email: body.email,
      name: body.name,
      phone: body.phone,
      metadata: body.metadata,
    });

    if (isProvisioningFailure(result)) {
      const { stage, message, type, code } = result.error;
      reply.status(provisioningFailureStatus(result.error)).send({ error: { stage, message, type, code } });
      return;
    }

    reply.status(HttpStatus.CREATED).send(result);
  }

  /**
   * POST /billing/portal-sessions - Create a Customer Portal session
   *
   * The caller must make sure the customer belongs to the authenticated user.
   */
  @Post("portal-sessions")
  async createPortalSession(@Res() reply: FastifyReply, @Body() body: CreatePortalSessionDTO): Promise<void> {
    const session = await this.stripePortalService.createPortalSession(body.customerId, body.returnUrl);

    reply.status(HttpStatus.CREATED).send({ url: session.url });
  }

  /**
   * POST /billing/checkout-sessions - Create a Checkout Session for a one-time purchase
   */
  @Post("checkout-sessions")
  async createCheckoutSession(@Res() reply: FastifyReply, @Body() body: CreateCheckoutSessionDTO): Promise<void> {
    const session = await this.stripeCheckoutService.createCheckoutSession({
      clientReferenceId: body.clientReferenceId,
      stripeCustomerId: body.customerId,
      priceId: body.priceId,
      successUrl: body.successUrl,
      cancelUrl: body.cancelUrl,
    });

    reply.status(HttpStatus.CREATED).send({ id: session.id, url: session.url });
  }
}
