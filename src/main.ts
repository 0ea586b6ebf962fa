import 'reflect-metadata';
import 'dotenv/config';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { loadSettings } from './settings/settings.loader';
import { ConfigError, Settings } from './settings/types';

const logger = new Logger('Bootstrap');

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', reason instanceof Error ? reason.stack : String(reason));
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception thrown', error.stack);
});

const LEVEL_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

function enabledLevels(level: Settings['logLevel']): LogLevel[] {
  return LEVEL_ORDER.slice(0, LEVEL_ORDER.indexOf(level) + 1);
}

async function bootstrap() {
  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const app = await NestFactory.create(AppModule.register(settings), {
    logger: enabledLevels(settings.logLevel),
  });
  app.enableShutdownHooks();
  await app.listen(settings.port);
  logger.log(`Listening on port ${settings.port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
