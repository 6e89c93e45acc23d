/**
 * Global validation pipe
 * Turns request payloads into DTO instances and rejects malformed input with 422.
 */

import { ParseIntPipe, UnprocessableEntityException, ValidationError, ValidationPipe } from '@nestjs/common';
import { ApiResponseUtil, FieldProblem } from '../utils/api-response.util';

export function collectFieldProblems(errors: ValidationError[], parent?: string): FieldProblem[] {
  return errors.flatMap((error) => {
    const field = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => ({ field, message }));
    return [...own, ...collectFieldProblems(error.children ?? [], field)];
  });
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    forbidNonWhitelisted: false,
    exceptionFactory: (errors) =>
      new UnprocessableEntityException(ApiResponseUtil.error(collectFieldProblems(errors))),
  });
}

/**
 * Integer path parameter pipe with the same `detail` error body as the global pipe.
 */
export function createParseIdPipe(): ParseIntPipe {
  return new ParseIntPipe({
    exceptionFactory: (message) => new UnprocessableEntityException(ApiResponseUtil.error(message)),
  });
}
