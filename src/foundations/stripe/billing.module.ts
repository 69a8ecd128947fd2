import { DynamicModule, Module, Provider } from "@nestjs/common";
import { REGISTRATION_HOOK } from "../../common/interfaces/registration-hook.interface";
import { LoggingModule } from "../../core/logging/logging.module";
import { resolveBillingConfig } from "./config/billing.config";
import { BillingController } from "./controllers/billing.controller";
import { WebhookController } from "./controllers/webhook.controller";
import { BillingRegistrationHook } from "./hooks/billing-registration.hook";
import {
  BILLING_CONFIG,
  BillingModuleAsyncOptions,
  BillingModuleConfig,
} from "./interfaces/billing.config.interface";
import { ProvisioningService } from "./services/provisioning.service";
import { StripeCheckoutService } from "./services/stripe.checkout.service";
import { StripeCustomerService } from "./services/stripe.customer.service";
import { StripePortalService } from "./services/stripe.portal.service";
import { StripeService } from "./services/stripe.service";
import { StripeSubscriptionService } from "./services/stripe.subscription.service";
import { StripeWebhookService } from "./services/stripe.webhook.service";

/**
 * BillingModule
 *
 * Stripe customer provisioning, Customer Portal and Checkout sessions, and the checkout webhook.
 *
 * Usage:
 * ```typescript
 * // Synchronous configuration
 * BillingModule.forRoot({
 *   secretKey: 'sk_test_...',
 *   webhookSigningSecret: 'whsec_...',
 *   defaultPriceId: 'price_free',
 *   useTrial: true,
 *   fulfillOrder: async (session) => orders.fulfil(session),
 * })
 *
 * // Async configuration with ConfigService
 * BillingModule.forRootAsync({
 *   imports: [ConfigModule, OrdersModule],
 *   useFactory: (configService: ConfigService, orders: OrdersService) => ({
 *     secretKey: configService.get('STRIPE_SECRET_KEY'),
 *     webhookSigningSecret: configService.get('STRIPE_WEBHOOK_SECRET'),
 *     defaultPriceId: configService.get('STRIPE_DEFAULT_PRICE_ID'),
 *     fulfillOrder: (session) => orders.fulfil(session),
 *   }),
 *   inject: [ConfigService, OrdersService],
 * })
 * ```
 */
@Module({})
export class BillingModule {
  /**
   * Configure the BillingModule with synchronous options.
   * @param config - Configuration merged with defaults and validated immediately
   */
  static forRoot(config: BillingModuleConfig): DynamicModule {
    const configProvider: Provider = {
      provide: BILLING_CONFIG,
      useValue: resolveBillingConfig(config),
    };

    return this.createModule([configProvider]);
  }

  /**
   * Configure the BillingModule with async options.
   * @param options - Async options with useFactory function
   */
  static forRootAsync(options: BillingModuleAsyncOptions): DynamicModule {
    const configProvider: Provider = {
      provide: BILLING_CONFIG,
      useFactory: async (...args: unknown[]) => {
        const config = await options.useFactory(...args);
        return resolveBillingConfig(config);
      },
      inject: options.inject || [],
    };

    return this.createModule([configProvider], options.imports);
  }

  private static createModule(
    providers: Provider[],
    imports: NonNullable<BillingModuleAsyncOptions["imports"]> = [],
  ): DynamicModule {
    const registrationHookProvider: Provider = {
      provide: REGISTRATION_HOOK,
      useExisting: BillingRegistrationHook,
    };

    return {
      module: BillingModule,
      imports: [LoggingModule, ...imports],
      controllers: [BillingController, WebhookController],
      providers: [
        ...providers,
        // Stripe API Services
        StripeService,
        StripeCustomerService,
        StripeSubscriptionService,
        StripePortalService,
        StripeCheckoutService,
        StripeWebhookService,
        // Business Logic Services
        ProvisioningService,
        BillingRegistrationHook,
        registrationHookProvider,
      ],
      exports: [
        BILLING_CONFIG,
        StripeService,
        StripeCustomerService,
        StripeSubscriptionService,
        StripePortalService,
        StripeCheckoutService,
        StripeWebhookService,
        ProvisioningService,
        registrationHookProvider,
      ],
    };
  }
}
