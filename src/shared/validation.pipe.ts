import { ValidationPipe } from '@nestjs/common';
import { ValidationError as ConstraintViolation } from 'class-validator';
import { ValidationError } from './gateway-errors';

/** Reports the first violated rule only, so every 400 carries one readable message. */
export function firstViolationMessage(violations: ConstraintViolation[]): string {
  for (const violation of violations) {
    const messages = Object.values(violation.constraints ?? {});
    if (messages.length) {
      return messages[0];
    }
    const nested = firstViolationMessage(violation.children ?? []);
    if (nested) {
      return nested;
    }
  }
  return '';
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    stopAtFirstError: true,
    exceptionFactory: (violations) =>
      new ValidationError(firstViolationMessage(violations) || 'Invalid request'),
  });
}
