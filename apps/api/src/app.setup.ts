import { INestApplication, ValidationPipe, ValidationPipeOptions } from '@nestjs/common';
import helmet from 'helmet';
import compression from 'compression';
import * as bodyParser from 'body-parser';

import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { AppConfig } from './config/app.config';

export const VALIDATION_OPTIONS: ValidationPipeOptions = {
  whitelist: true,
  forbidNonWhitelisted: true,
  transform: true,
};

// Middleware, pipes, filters and routing shared by the server and the HTTP specs
export function configureApp(app: INestApplication, config: AppConfig): void {
  // Security
  app.use(helmet());
  app.use(compression());

  // Region mapping batches can be large
  app.use(bodyParser.json({ limit: '10mb' }));
  app.use(bodyParser.urlencoded({ limit: '10mb', extended: true }));

  // CORS
  app.enableCors({
    origin: config.corsOrigins,
    credentials: true,
  });

  // Global pipes
  app.useGlobalPipes(new ValidationPipe(VALIDATION_OPTIONS));

  // Global filters
  app.useGlobalFilters(new AllExceptionsFilter());

  // API prefix; health routes stay at the root
  app.setGlobalPrefix('api/v1', { exclude: ['/', 'health'] });
}
