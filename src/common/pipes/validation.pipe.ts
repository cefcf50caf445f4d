import { ValidationPipe } from '@nestjs/common';
import { ValidationError as ClassValidatorError } from 'class-validator';
import { ValidationError } from '../errors/ask.errors';

// When several constraints fail on one property, report the most basic one.
const CONSTRAINT_PRIORITY = ['isDefined', 'isNotEmpty', 'isString', 'isBoolean', 'maxLength'];

function firstMessage(errors: ClassValidatorError[]): string | undefined {
  for (const error of errors) {
    const constraints = error.constraints ?? {};
    const ranked = Object.keys(constraints).sort(
      (a, b) => rank(a) - rank(b),
    );
    if (ranked.length > 0) {
      return constraints[ranked[0]];
    }
    const nested = firstMessage(error.children ?? []);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

function rank(constraint: string): number {
  const index = CONSTRAINT_PRIORITY.indexOf(constraint);
  return index === -1 ? CONSTRAINT_PRIORITY.length : index;
}

/**
 * Global validation pipe. Failed DTO validation surfaces as the `ValidationError`
 * kind with a single message.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    exceptionFactory: (errors) => new ValidationError(firstMessage(errors) ?? 'request body is invalid'),
  });
}
