import { buildMessage, isISO8601, ValidateBy, ValidationOptions } from 'class-validator';

export const IS_TIMESTAMP = 'isTimestamp';

// Calendar dates only: week dates, ordinal dates and the basic format are rejected.
const CALENDAR_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

/** True for ISO 8601 calendar date-times that `Date` can turn into an instant. */
export function isTimestamp(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    CALENDAR_TIMESTAMP.test(value) &&
    isISO8601(value, { strict: true, strictSeparator: true }) &&
    !Number.isNaN(Date.parse(value))
  );
}

export function IsTimestamp(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_TIMESTAMP,
      validator: {
        validate: (value): boolean => isTimestamp(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be an ISO 8601 date-time such as 2024-05-01T10:00:00Z`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
