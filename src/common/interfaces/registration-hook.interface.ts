/**
 * Hook the host application calls once a new user has been created.
 */
export interface RegistrationHookInterface {
  onRegistrationComplete(params: { userId: string; email: string; name?: string }): Promise<void>;
}

export const REGISTRATION_HOOK = Symbol("REGISTRATION_HOOK");
