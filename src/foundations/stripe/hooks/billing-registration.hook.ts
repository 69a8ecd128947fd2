import { Injectable, Logger } from "@nestjs/common";
import { RegistrationHookInterface } from "../../../common/interfaces/registration-hook.interface";
import { isProvisioningFailure } from "../interfaces/provisioning.interface";
import { ProvisioningService } from "../services/provisioning.service";

/**
 * Registration hook that provisions the Stripe customer and subscription of every new user.
 */
@Injectable()
export class BillingRegistrationHook implements RegistrationHookInterface {
  private readonly logger = new Logger(BillingRegistrationHook.name);

  constructor(private readonly provisioningService: ProvisioningService) {}

  /**
   * Called after a new user has been created. A provisioning failure is logged and does not fail the registration.
   */
  async onRegistrationComplete(params: { userId: string; email: string; name?: string }): Promise<void> {
    this.logger.log(`Provisioning billing for new user ${params.userId}`);

    const result = await this.provisioningService.provision({
      email: params.email,
      name: params.name,
      metadata: { userId: params.userId },
    });

    if (isProvisioningFailure(result)) {
      this.logger.error(
        `Failed to provision billing for user ${params.userId} at the ${result.error.stage} step: ${result.error.message}`,
      );
      return;
    }

    this.logger.log(
      `Provisioned customer ${result.customer.id} and subscription ${result.subscription.id} for user ${params.userId}`,
    );
  }
}
