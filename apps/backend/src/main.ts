import 'reflect-metadata';

import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { RegistryExceptionFilter } from './common/filters/registry-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);
  const port = Number(config.get<string>('PORT', '3000'));

  app.setGlobalPrefix('api');
  app.enableCors({
    origin: config.get<string>('CORS_ORIGIN', 'http://localhost:5173'),
  });
  app.enableShutdownHooks();

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );
  app.useGlobalFilters(new RegistryExceptionFilter());

  await app.listen(port, '0.0.0.0');
  Logger.log(`Registry listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  const stack = error instanceof Error ? error.stack : undefined;
  Logger.error(`Bootstrap failed: ${String(error)}`, stack, 'Bootstrap');
  process.exit(1);
});
