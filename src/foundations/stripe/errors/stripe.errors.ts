import { HttpException, HttpStatus, UnauthorizedException } from "@nestjs/common";
import Stripe from "stripe";

export function isStripeError(error: unknown): error is Stripe.errors.StripeError {
  return error instanceof Stripe.errors.StripeError;
}

/**
 * HTTP status reported to the caller for a failed Stripe call.
 *
 * Authentication and permission errors come from this service's own key, so they are reported as server errors.
 */
export function stripeErrorStatus(error: Stripe.errors.StripeError): HttpStatus {
  switch (error.type) {
    case "StripeCardError":
      return HttpStatus.PAYMENT_REQUIRED;
    case "StripeInvalidRequestError":
      return HttpStatus.BAD_REQUEST;
    case "StripeRateLimitError":
      return HttpStatus.TOO_MANY_REQUESTS;
    case "StripeAuthenticationError":
    case "StripePermissionError":
      return HttpStatus.INTERNAL_SERVER_ERROR;
    default:
      return HttpStatus.BAD_GATEWAY;
  }
}

export class StripeProviderException extends HttpException {
  constructor(readonly stripeError: Stripe.errors.StripeError) {
    super(
      {
        message: stripeError.message,
        type: stripeError.type,
        code: stripeError.code,
      },
      stripeErrorStatus(stripeError),
      { cause: stripeError },
    );
  }
}

/**
 * Rejection of a webhook delivery whose signature could not be verified.
 */
export class WebhookSignatureException extends UnauthorizedException {
  constructor(reason: string) {
    super(`Webhook signature verification failed: ${reason}`);
  }
}

/**
 * Method decorator converting Stripe SDK errors thrown by an async method into a StripeProviderException.
 * Any other error is rethrown unchanged.
 *
 * @example
 * ```typescript
 * @HandleStripeErrors()
 * async createPortalSession(stripeCustomerId: string): Promise<Stripe.BillingPortal.Session> {
 *   return this.stripeService.getClient().billingPortal.sessions.create({ customer: stripeCustomerId });
 * }
 * ```
 */
export function HandleStripeErrors() {
  return function <TArgs extends unknown[], TResult>(
    _target: object,
    _propertyKey: string | symbol,
    descriptor: TypedPropertyDescriptor<(...args: TArgs) => Promise<TResult>>,
  ): TypedPropertyDescriptor<(...args: TArgs) => Promise<TResult>> {
    const original = descriptor.value;
    if (!original) return descriptor;

    descriptor.value = async function (this: unknown, ...args: TArgs): Promise<TResult> {
      try {
        return await original.apply(this, args);
      } catch (error) {
        if (isStripeError(error)) {
          throw new StripeProviderException(error);
        }
        throw error;
      }
    };

    return descriptor;
  };
}
