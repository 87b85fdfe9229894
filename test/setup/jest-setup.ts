import 'reflect-metadata';
import { Logger } from '@nestjs/common';

jest.setTimeout(30000);

process.env.NODE_ENV = process.env.NODE_ENV || 'test';
// pino-http runs in the e2e apps; keep its request lines out of the test output.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

// Nest's default console logger is noisy during import tests.
Logger.overrideLogger(false);
