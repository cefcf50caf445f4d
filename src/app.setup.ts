import { INestApplication } from '@nestjs/common';
import { AskExceptionFilter } from './common/filters/ask-exception.filter';
import { createValidationPipe } from './common/pipes/validation.pipe';

/**
 * HTTP pipeline shared by the server bootstrap and the e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new AskExceptionFilter());
  return app;
}
