import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, LogLevel } from '@nestjs/common';
import { WorkerModule } from './worker.module';
import config from './worker.config';

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

function logLevelsUpTo(level: string): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return LOG_LEVELS.slice(0, index >= 0 ? index + 1 : LOG_LEVELS.length);
}

async function bootstrap() {
  const logger = new Logger('Worker');

  const configWorker = config();

  const app = await NestFactory.createApplicationContext(WorkerModule, {
    logger: logLevelsUpTo(configWorker.worker.logger),
  });

  const signals = ['SIGTERM', 'SIGINT'];

  for (const signal of signals) {
    process.on(signal, async () => {
      logger.log(`Received ${signal}, starting graceful shutdown...`);
      await app.close();

      logger.log('Worker closed');
      process.exit(0);
    });
  }

  logger.log('Worker started, running scheduled upload cleanup');
}

bootstrap().catch((error: unknown) => {
  new Logger('Worker').error('Failed to start worker', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
