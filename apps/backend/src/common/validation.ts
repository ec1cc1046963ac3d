import { BadRequestException, ValidationPipeOptions } from '@nestjs/common';

export interface ValidationIssue {
  field: string;
  constraint: string;
  message: string;
}

// Structural subset shared by class-validator's ValidationError and Nest's re-export of it.
interface PropertyErrors {
  property: string;
  constraints?: Record<string, string>;
  children?: PropertyErrors[];
}

export function flattenValidationErrors(errors: PropertyErrors[], parentPath = ''): ValidationIssue[] {
  return errors.flatMap((error) => {
    const field = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.entries(error.constraints ?? {}).map(([constraint, message]) => ({
      field,
      constraint,
      message,
    }));

    return [...own, ...flattenValidationErrors(error.children ?? [], field)];
  });
}

export const validationPipeOptions: ValidationPipeOptions = {
  whitelist: true,
  transform: true,
  forbidNonWhitelisted: true,
  exceptionFactory: (errors) =>
    new BadRequestException({
      statusCode: 400,
      message: 'Validation failed',
      errors: flattenValidationErrors(errors),
    }),
};
