import { BadRequestException, INestApplication, ValidationPipe } from '@nestjs/common';
import type { ValidationError as ClassValidationError } from 'class-validator';
import type { ProvisionResult } from './infra/contracts/provision.dto';
import { InvalidRequestFilter } from './infra/http/invalid-request.filter';

function describeValidationErrors(errors: ClassValidationError[]): string {
  return errors
    .flatMap((e) => Object.values(e.constraints ?? {}))
    .join('; ');
}

/**
 * Global pipe for request DTOs. Unknown fields are dropped; type mismatches answer
 * 400 in the ProvisionResult shape.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors) => {
      const body: ProvisionResult = {
        success: false,
        message: '',
        error: `Invalid request format: ${describeValidationErrors(errors)}`,
      };
      return new BadRequestException(body);
    },
  });
}

/** Settings shared by bootstrap and the e2e tests. */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new InvalidRequestFilter());
  return app;
}
