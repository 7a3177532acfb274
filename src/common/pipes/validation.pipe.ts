import { ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { ErrorDetail, ValidationException } from '../exceptions/app.exception';

export function flattenValidationErrors(errors: ValidationError[], parent?: string): ErrorDetail[] {
  const details: ErrorDetail[] = [];
  for (const error of errors) {
    const field = parent ? `${parent}.${error.property}` : error.property;
    for (const message of Object.values(error.constraints ?? {})) {
      details.push({ field, message });
    }
    if (error.children && error.children.length > 0) {
      details.push(...flattenValidationErrors(error.children, field));
    }
  }
  return details;
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors) => new ValidationException(flattenValidationErrors(errors)),
  });
}
