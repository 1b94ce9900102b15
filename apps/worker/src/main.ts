import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { APP_SETTINGS, AppSettings, ConfigurationError, toNestLogLevels } from '@libs/core';
import { WorkerModule } from './worker.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(WorkerModule, {
    logger: toNestLogLevels(process.env.LOG_LEVEL),
    // lets a ConfigurationError reach the catch below
    abortOnError: false,
  });
  app.enableShutdownHooks();
  const settings = app.get<AppSettings>(APP_SETTINGS);
  const host = '0.0.0.0';
  const logger = new Logger('WorkerBootstrap');

  await app.listen(settings.port, host);
  logger.log(`Worker listening on ${host}:${settings.port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('WorkerBootstrap');
  if (error instanceof ConfigurationError) {
    logger.error(JSON.stringify({ event: 'configuration_invalid', key: error.key ?? null, message: error.message }));
  } else {
    logger.error(error instanceof Error ? (error.stack ?? error.message) : 'Unknown error');
  }
  process.exit(1);
});
