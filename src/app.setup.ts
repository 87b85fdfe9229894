import { INestApplication, ValidationPipe } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { IncomingMessage, ServerResponse } from 'node:http';
import { ErrorEnvelopeFilter } from './common/filters/error-envelope.filter';
import { requestContext } from './common/logger/request-context';

/**
 * Request id middleware, validation and error rendering shared by the
 * server and the end-to-end tests.
 */
export function configureApp(app: INestApplication): void {
  app.use(
    (req: IncomingMessage, res: ServerResponse, next: (err?: unknown) => void) => {
      const header = req.headers['x-request-id'] ?? req.headers['x-requestid'];
      const candidate = Array.isArray(header) ? header[0] : header;
      const rid = candidate && candidate.length > 0 ? candidate : randomUUID();
      res.setHeader('X-Request-Id', rid);
      requestContext.run({ requestId: rid }, () => next());
    },
  );

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new ErrorEnvelopeFilter());
}
