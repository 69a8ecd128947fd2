import { Injectable } from "@nestjs/common";
import Stripe from "stripe";
import { StripeService } from "./stripe.service";

@Injectable()
export class StripeSubscriptionService {
  constructor(private readonly stripeService: StripeService) {}

  /**
   * Create a subscription on a single price.
   *
   * `trial_period_days` is only sent when a trial length is given.
   *
   * @throws {StripeError} If subscription creation fails
   */
  async createSubscription(params: {
    stripeCustomerId: string;
    priceId: string;
    trialPeriodDays?: number;
  }): Promise<Stripe.Subscription> {
    const stripe = this.stripeService.getClient();

    const subscriptionParams: Stripe.SubscriptionCreateParams = {
      customer: params.stripeCustomerId,
      items: [{ price: params.priceId }],
    };

    if (params.trialPeriodDays !== undefined) {
      subscriptionParams.trial_period_days = params.trialPeriodDays;
    }

    return stripe.subscriptions.create(subscriptionParams);
  }
}
