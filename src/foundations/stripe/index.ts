export * from "./billing.module";
export * from "./config/billing.config";
export * from "./controllers/billing.controller";
export * from "./controllers/webhook.controller";
export * from "./dtos/create-checkout-session.dto";
export * from "./dtos/create-portal-session.dto";
export * from "./dtos/provision-customer.dto";
export * from "./errors/stripe.errors";
export * from "./hooks/billing-registration.hook";
export * from "./interfaces/billing.config.interface";
export * from "./interfaces/provisioning.interface";
export * from "./interfaces/webhook.interface";
export * from "./services/provisioning.service";
export * from "./services/stripe.checkout.service";
export * from "./services/stripe.customer.service";
export * from "./services/stripe.portal.service";
export * from "./services/stripe.service";
export * from "./services/stripe.subscription.service";
export * from "./services/stripe.webhook.service";
