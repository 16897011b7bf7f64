import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module.js';
import { SchedulingExceptionFilter } from './common/filters/scheduling-exception.filter.js';
import type { Env } from './config/env.js';
import { runMigrations } from './database/migrate.js';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  await runMigrations();

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter(),
  );

  app.enableCors();
  app.enableShutdownHooks();
  app.setGlobalPrefix('api');
  app.useGlobalFilters(new SchedulingExceptionFilter());

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Clinic Slot Scheduler API')
    .setDescription('Slot generation, availability search and appointment booking')
    .setVersion('1.0')
    .addBearerAuth()
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const port = app.get(ConfigService).getOrThrow<Env['PORT']>('PORT');
  await app.listen(port, '0.0.0.0');
  logger.log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
