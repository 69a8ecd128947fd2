import { Inject, Injectable } from "@nestjs/common";
import Stripe from "stripe";
import { AppLoggingService } from "../../../core/logging/services/logging.service";
import { isStripeError } from "../errors/stripe.errors";
import { BILLING_CONFIG, ResolvedBillingConfig } from "../interfaces/billing.config.interface";
import {
  BillingFailure,
  BillingFailureStage,
  CustomerFields,
  ProvisioningFailure,
  ProvisioningResult,
} from "../interfaces/provisioning.interface";
import { StripeCustomerService } from "./stripe.customer.service";
import { StripeSubscriptionService } from "./stripe.subscription.service";

export function toBillingFailure(stage: BillingFailureStage, error: unknown): BillingFailure {
  if (isStripeError(error)) {
    return {
      stage,
      message: error.message,
      type: error.type,
      code: error.code,
      statusCode: error.statusCode,
      cause: error,
    };
  }

  return {
    stage,
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  };
}

/**
 * Provisioning Service
 *
 * Creates the Stripe customer of a new user and subscribes it to the default price.
 *
 * Failures are returned, never thrown. A customer whose subscription could not be created is
 * left in Stripe as it is: it is neither deleted nor retried.
 */
@Injectable()
export class ProvisioningService {
  constructor(
    @Inject(BILLING_CONFIG) private readonly config: ResolvedBillingConfig,
    private readonly stripeCustomerService: StripeCustomerService,
    private readonly stripeSubscriptionService: StripeSubscriptionService,
    private readonly logger: AppLoggingService,
  ) {}

  async provision(fields: CustomerFields): Promise<ProvisioningResult> {
    let customer: Stripe.Customer;
    try {
      customer = await this.stripeCustomerService.createCustomer({
        email: fields.email,
        name: fields.name,
        phone: fields.phone,
        metadata: this.buildMetadata(fields.metadata),
      });
    } catch (error) {
      return this.fail("customer", error);
    }

    let subscription: Stripe.Subscription;
    try {
      subscription = await this.stripeSubscriptionService.createSubscription({
        stripeCustomerId: customer.id,
        priceId: this.config.defaultPriceId,
        trialPeriodDays: this.config.useTrial ? this.config.trialPeriodDays : undefined,
      });
    } catch (error) {
      this.logger.warn(`Customer ${customer.id} was created without a subscription`, ProvisioningService.name, {
        customerId: customer.id,
      });
      return this.fail("subscription", error);
    }

    this.logger.logBusinessEvent("CustomerProvisioned", {
      customerId: customer.id,
      subscriptionId: subscription.id,
      priceId: this.config.defaultPriceId,
      trial: this.config.useTrial,
    });

    return { customer, subscription };
  }

  private buildMetadata(metadata?: Record<string, string>): Record<string, string> | undefined {
    const merged: Record<string, string> = { ...metadata };
    if (this.config.projectId) merged.projectId = this.config.projectId;

    return Object.keys(merged).length > 0 ? merged : undefined;
  }

  private fail(stage: BillingFailureStage, error: unknown): ProvisioningFailure {
    const failure = toBillingFailure(stage, error);

    this.logger.error(
      `Provisioning failed while creating the ${stage}: ${failure.message}`,
      error instanceof Error ? error : undefined,
      ProvisioningService.name,
      { stage, type: failure.type, code: failure.code },
    );

    return { error: failure };
  }
}
