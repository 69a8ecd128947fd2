import { Injectable } from "@nestjs/common";
import Stripe from "stripe";
import { StripeService } from "./stripe.service";

/**
 * Stripe Customer Service
 *
 * Creates Stripe customers. Errors from Stripe are thrown as they are, callers decide how to report them.
 */
@Injectable()
export class StripeCustomerService {
  constructor(private readonly stripeService: StripeService) {}

  /**
   * @throws {StripeError} If customer creation fails
   *
   * @example
   * ```typescript
   * const customer = await service.createCustomer({
   *   email: 'jane@example.com',
   *   name: 'Jane Doe',
   *   metadata: { userId: 'user_123' },
   * });
   * ```
   */
  async createCustomer(params: {
    email: string;
    name?: string;
    phone?: string;
    metadata?: Record<string, string>;
  }): Promise<Stripe.Customer> {
    const stripe = this.stripeService.getClient();

    const customerParams: Stripe.CustomerCreateParams = {
      email: params.email,
    };

    if (params.name) customerParams.name = params.name;
    if (params.phone) customerParams.phone = params.phone;
    if (params.metadata && Object.keys(params.metadata).length > 0) {
      customerParams.metadata = params.metadata;
    }

    return stripe.customers.create(customerParams);
  }
}
