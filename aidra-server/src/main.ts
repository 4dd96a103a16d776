import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { AidraConfig, aidraConfig } from './config/aidra.config';
import { enabledLogLevels } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const config = app.get<AidraConfig>(aidraConfig.KEY);

  app.useLogger(enabledLogLevels(config.logLevel));
  app.enableCors();
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(`AIDRA listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
    'Bootstrap',
  );
  process.exitCode = 1;
});
