import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import type { OpenAPIObject } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { corsAllowlist } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  const config = app.get(ConfigService);

  const allowlist = corsAllowlist(config.get<string>('CORS_ORIGINS') ?? '');
  if (allowlist.length > 0) {
    app.enableCors({ origin: allowlist });
  } else {
    app.enableCors();
  }

  configureApp(app);

  const document: Omit<OpenAPIObject, 'paths'> = new DocumentBuilder()
    .setTitle('Inventory Ledger API')
    .setDescription('Spreadsheet inventory ingestion, ledger queries and stock analytics')
    .setVersion('1.0.0')
    .build();
  SwaggerModule.setup('api', app, SwaggerModule.createDocument(app, document));

  await app.listen(config.get<number>('PORT') ?? 3000);
}

void bootstrap();
