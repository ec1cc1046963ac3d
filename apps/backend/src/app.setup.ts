import { INestApplication, RequestMethod, ValidationPipe } from '@nestjs/common';

import { validationPipeOptions } from './common/validation';
import { DocumentStoreExceptionFilter } from './database/document-store-exception.filter';

export interface AppSetupOptions {
  corsOrigin?: string;
}

/** Shared by the bootstrap and the HTTP tests so both see the same routing and validation. */
export function configureApp(app: INestApplication, options: AppSetupOptions = {}): INestApplication {
  app.setGlobalPrefix('api', {
    exclude: [
      { path: '/', method: RequestMethod.GET },
      { path: 'test', method: RequestMethod.GET },
    ],
  });
  app.enableCors({
    origin: options.corsOrigin ?? '*',
  });

  app.useGlobalPipes(new ValidationPipe(validationPipeOptions));
  app.useGlobalFilters(new DocumentStoreExceptionFilter());

  return app;
}
