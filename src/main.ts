import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { errorMessage } from './core/errors/subscription.errors';
import { logger } from './core/logger/logger.config';

async function bootstrap() {
  const pinoLogger = logger();

  process.setMaxListeners(30);

  // rawBody keeps the exact bytes the payment provider signed
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: false,
    rawBody: true,
  });
  configureApp(app);

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3001);
  await app.listen(port);

  pinoLogger.info(
    {
      port,
      paymentProvider: configService.get<string>('PAYMENT_PROVIDER'),
      storeDriver: configService.get<string>('STORE_DRIVER'),
    },
    `Application running on: http://localhost:${port}`,
  );
}

bootstrap().catch((error: unknown) => {
  const pinoLogger = logger();
  pinoLogger.error(
    {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    },
    'Failed to start application',
  );
  process.exit(1);
});
