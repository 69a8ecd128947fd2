import { FactoryProvider, ModuleMetadata } from "@nestjs/common";
import type Stripe from "stripe";

/**
 * Fulfillment callback invoked with the session of every verified `checkout.session.completed` event.
 *
 * Stripe delivers webhooks at least once, so the callback can run more than once for the same session.
 */
export type FulfillOrderHandler = (session: Stripe.Checkout.Session) => void | Promise<void>;

/**
 * Configuration for the BillingModule.
 */
export interface BillingModuleConfig {
  /**
   * Stripe secret API key (sk_test_... or sk_live_...)
   */
  secretKey: string;

  /**
   * Signing secret of the webhook endpoint (whsec_...)
   */
  webhookSigningSecret: string;

  /**
   * Price every subscription created at signup is attached to
   */
  defaultPriceId: string;

  /**
   * Attach a trial period to subscriptions created at signup
   * @default false
   */
  useTrial?: boolean;

  /**
   * Trial length in days, only used when `useTrial` is true
   * @default 14
   */
  trialPeriodDays?: number;

  fulfillOrder: FulfillOrderHandler;

  /**
   * Connected account the Stripe client acts on behalf of
   */
  accountId?: string;

  /**
   * Project the customers belong to, stored in customer metadata
   */
  projectId?: string;

  /**
   * Return URL used for portal sessions that do not supply one
   */
  portalReturnUrl?: string;

  portalConfigurationId?: string;

  /**
   * Stripe request timeout in milliseconds
   * @default 30000
   */
  timeout?: number;
}

export type ResolvedBillingConfig = BillingModuleConfig & Required<Pick<BillingModuleConfig, "useTrial" | "trialPeriodDays" | "timeout">>;

/**
 * Async options for BillingModule.forRootAsync()
 */
export interface BillingModuleAsyncOptions {
  imports?: ModuleMetadata["imports"];
  useFactory: FactoryProvider<BillingModuleConfig>["useFactory"];
  inject?: FactoryProvider["inject"];
}

export const BILLING_CONFIG = Symbol("BILLING_CONFIG");

export const DEFAULT_BILLING_CONFIG: Required<Pick<BillingModuleConfig, "useTrial" | "trialPeriodDays" | "timeout">> = {
  useTrial: false,
  trialPeriodDays: 14,
  timeout: 30000,
};
