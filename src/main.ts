#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { AppModule } from './app.module';
import { validateEnv } from './config/validation.schema';
import { ExitCode } from './application/ports/input/run-sync.port';
import { RunSyncUseCase } from './application/use-cases/run-sync.use-case';
import { ConfigError, describeError } from './domain/errors';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

const logger = new Logger('Bootstrap');

/**
 * Runs one sync pass and resolves to the process exit code.
 * Configuration is validated before the application context (and any client)
 * is created.
 */
async function bootstrap(): Promise<number> {
  // .env is merged into process.env when the config module is registered
  await ConfigModule.envVariablesLoaded;

  try {
    validateEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration validation failed:\n${error.issues.join('\n')}`);
      return ExitCode.FAILURE;
    }
    throw error;
  }

  // Standalone application context: no HTTP listener, the job runs once
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const appLogger = app.get(PinoLoggerService);
  app.useLogger(appLogger);

  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn(`Second interrupt received (${signal}), exiting immediately`);
      appLogger.flush();
      process.exit(ExitCode.INTERRUPTED);
    }
    logger.warn(`Interrupt received (${signal}), stopping after the current task`);
    controller.abort();
  };
  process.on('SIGINT', interrupt);
  process.on('SIGTERM', interrupt);

  try {
    logger.log(`Starting Workfront document upload workflow (pid ${process.pid})`);
    const result = await app.get(RunSyncUseCase).execute({ signal: controller.signal });
    return result.exitCode;
  } finally {
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
    await app.close();
  }
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error(`Unexpected error in workflow: ${describeError(error)}`);
    process.exitCode = ExitCode.FAILURE;
  });
