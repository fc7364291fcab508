import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, LogLevel, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { INTERNAL_SECRET_HEADER } from './internal/internal-secret.guard';

const LOG_LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

function resolveLogLevels(raw: string | undefined): LogLevel[] {
  const requested = (raw ?? '').split(',').map((level) => level.trim());
  const levels = LOG_LEVELS.filter((level) => requested.includes(level));
  return levels.length > 0 ? levels : ['error', 'warn', 'log'];
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });

  app.enableShutdownHooks();

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('ACME Orchestrator API')
    .setDescription('Certificate issuance tasks, renewal and TLS policy binding')
    .setVersion('1.0')
    .addApiKey({ type: 'apiKey', name: INTERNAL_SECRET_HEADER, in: 'header' }, 'internal-secret')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, {
    customSiteTitle: 'ACME Orchestrator API',
  });

  const port = process.env.PORT || 3000;
  await app.listen(port);
  Logger.log(`Application is running on: http://localhost:${port}`, 'Bootstrap');
}

void bootstrap();
