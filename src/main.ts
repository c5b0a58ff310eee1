import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ensureRuntimeEnvLoaded, readRuntimeSettings } from './runtime-env';

async function bootstrap(): Promise<void> {
  ensureRuntimeEnvLoaded();
  const settings = readRuntimeSettings();

  const app = await NestFactory.create(AppModule);
  app.enableCors({
    origin: true,
  });
  await app.listen(settings.port);

  Logger.log(`Listening on port ${settings.port}.`, 'Bootstrap');
}

void bootstrap();
