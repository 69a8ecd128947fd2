import { ValidateBy, ValidationOptions, buildMessage } from "class-validator";

export const IS_STRING_RECORD = "isStringRecord";

export function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((entry) => typeof entry === "string");
}

/**
 * Checks that the value is a plain object whose values are all strings, the shape Stripe accepts as metadata.
 */
export function IsStringRecord(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_STRING_RECORD,
      validator: {
        validate: (value): boolean => isStringRecord(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be an object whose values are strings`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
