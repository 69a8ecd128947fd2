import type Stripe from "stripe";

export interface CustomerFields {
  email: string;
  name?: string;
  phone?: string;
  metadata?: Record<string, string>;
}

export type BillingFailureStage = "customer" | "subscription";

export interface BillingFailure {
  stage: BillingFailureStage;
  message: string;
  type?: string;
  code?: string;
  statusCode?: number;
  /** The error thrown by the Stripe call */
  cause: unknown;
}

export interface ProvisionedSubscription {
  customer: Stripe.Customer;
  subscription: Stripe.Subscription;
}

export interface ProvisioningFailure {
  error: BillingFailure;
}

export type ProvisioningResult = ProvisionedSubscription | ProvisioningFailure;

export function isProvisioningFailure(result: ProvisioningResult): result is ProvisioningFailure {
  return "error" in result;
}
