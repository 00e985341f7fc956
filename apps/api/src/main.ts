import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, LogLevel, ValidationPipe } from '@nestjs/common';
import { Request, Response } from 'express';
import compression from 'compression';
import config from './api.config';
import { ApiModule } from './api.module';
import { useContainer } from 'class-validator';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

function logLevelsUpTo(level: string): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return LOG_LEVELS.slice(0, index >= 0 ? index + 1 : LOG_LEVELS.length);
}

async function bootstrap() {
  const logger = new Logger('Api');
  const configApi = config();

  const app = await NestFactory.create(
    ApiModule,
    {
      logger: logLevelsUpTo(configApi.app.logger),
    },
  );
  app.use(compression({ filter: shouldCompress }));
  app.setGlobalPrefix('v1');

  app.enableCors({
    origin: '*',
    methods: 'GET,HEAD,POST,OPTIONS',
    allowedHeaders: 'Content-Type, Authorization, x-api-key',
    credentials: false,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      transformOptions: { enableImplicitConversion: true },
      whitelist: true,
    }),
  );

  useContainer(app.select(ApiModule), { fallbackOnErrors: true });

  if (configApi.app.env !== 'production') {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Resumable Upload API')
      .setVersion('1.0')
      .addApiKey({
        type: 'apiKey',
        name: 'x-api-key',
        in: 'header',
      }, 'api_key')
      .build();

    const document = SwaggerModule.createDocument(app, swaggerConfig);

    SwaggerModule.setup('_docs', app, document);
  }

  const signals = ['SIGTERM', 'SIGINT'];

  for (const signal of signals) {
    process.on(signal, async () => {
      logger.log(`Received ${signal}, starting graceful shutdown...`);
      await app.close();

      logger.log('Api service closed');
      process.exit(0);
    });
  }

  await app.listen(configApi.app.port, configApi.app.host);
  logger.log(`Api listening on ${configApi.app.host}:${configApi.app.port}`);
}

function shouldCompress(req: Request, res: Response): boolean {
  if (req.headers['x-no-compression']) {
    return false;
  }
  return compression.filter(req, res);
}

bootstrap().catch((error: unknown) => {
  new Logger('Api').error('Failed to start api', error);
  process.exit(1);
});
