import * as dotenv from 'dotenv';
dotenv.config();

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG, AppConfig } from './config/app.config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'log'],
  });
  const config = app.get<AppConfig>(APP_CONFIG);

  configureApp(app, config);

  const server = await app.listen(config.port);
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;

  logger.log(`API listening on port ${config.port} (${config.environment})`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start API', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
