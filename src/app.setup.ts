import { INestApplication, ValidationPipe } from '@nestjs/common';
import { DomainExceptionFilter } from './core/errors/domain-exception.filter';

/**
 * HTTP setup shared by the server entry point and the e2e tests
 */
export const configureApp = (app: INestApplication): INestApplication => {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );
  app.useGlobalFilters(new DomainExceptionFilter());
  app.setGlobalPrefix('api');
  app.enableShutdownHooks();
  return app;
};
