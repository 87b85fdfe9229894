import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { randomUUID } from 'node:crypto';
import { IncomingMessage, ServerResponse } from 'node:http';
import { inventoryFromPath } from './common/logger/request-context';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './core/database/database.module';
import { PersistenceModule } from './core/persistence/persistence.module';
import { FeaturesModule } from './features.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        pinoHttp: {
          level: config.get<string>('LOG_LEVEL') ?? 'info',
          quietReqLogger: true,
          genReqId: (req: { headers?: Record<string, unknown> }) => {
            const headers: Record<string, unknown> = req?.headers ?? {};
            const candidate = headers['x-request-id'] ?? headers['x-requestid'];
            return typeof candidate === 'string' && candidate.length > 0
              ? candidate
              : randomUUID();
          },
          serializers: {
            // Omit req/res objects for compact logs
            req: () => undefined,
            res: () => undefined,
          },
          customAttributeKeys: {
            responseTime: 'responseTimeMs',
          },
          customProps: (req: IncomingMessage, res: ServerResponse) => ({
            requestId: 'id' in req ? req.id : undefined,
            inventoryName: inventoryFromPath(req.url),
            path: req.url,
            method: req.method,
            status: res.statusCode,
          }),
          redact: {
            paths: ['req.headers.authorization', 'req.headers.cookie'],
            censor: '[REDACTED]',
          },
        },
      }),
    }),
    DatabaseModule,
    PersistenceModule,
    FeaturesModule,
  ],
})
export class AppModule {}
