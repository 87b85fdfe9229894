import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Error as MongooseError } from 'mongoose';
import { MongoServerError } from 'mongodb';
import { getInventoryName, getRequestId } from '../logger/request-context';

export interface ErrorEnvelope {
  ok: false;
  status: number;
  title: string;
  message: string;
  path: string;
  requestId?: string;
  errors?: unknown;
}

interface MappedError {
  status: number;
  title: string;
  message: string;
  errors?: unknown;
}

type HttpExceptionObject = {
  statusCode?: number;
  message?: unknown;
  error?: unknown;
  errors?: unknown;
};

function isHttpExceptionObject(value: unknown): value is HttpExceptionObject {
  return typeof value === 'object' && value !== null;
}

const STATUS_TITLES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'Bad Request',
  [HttpStatus.NOT_FOUND]: 'Not Found',
  [HttpStatus.CONFLICT]: 'Conflict',
  [HttpStatus.PAYLOAD_TOO_LARGE]: 'Payload Too Large',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
};

export function statusTitle(status: number): string {
  return STATUS_TITLES[status] ?? `Error ${status}`;
}

/**
 * Renders every error as `{ ok: false, status, title, message, path }`.
 */
@Catch()
export class ErrorEnvelopeFilter implements ExceptionFilter {
  private readonly logger = new Logger(ErrorEnvelopeFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const mapped = this.mapException(exception);

    if (mapped.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const inventory = getInventoryName();
      const prefix = inventory ? `[${inventory}] ` : '';
      if (exception instanceof Error) {
        this.logger.error(`${prefix}${exception.message}`, exception.stack);
      } else {
        this.logger.error(`${prefix}Unknown error: ${String(exception)}`);
      }
    }

    const requestId = getRequestId();
    const envelope: ErrorEnvelope = {
      ok: false,
      status: mapped.status,
      title: mapped.title,
      message: mapped.message,
      path: request.originalUrl ?? request.url,
      ...(requestId ? { requestId } : {}),
      ...(mapped.errors !== undefined ? { errors: mapped.errors } : {}),
    };

    response.status(mapped.status).json(envelope);
  }

  mapException(exception: unknown): MappedError {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const res = exception.getResponse();
      let title = statusTitle(status);
      let message = exception.message;
      let errors: unknown;

      if (typeof res === 'string') {
        message = res;
      } else if (isHttpExceptionObject(res)) {
        if (typeof res.error === 'string') title = res.error;
        if (Array.isArray(res.message)) {
          errors = res.message;
          message = res.message.join(', ');
        } else if (typeof res.message === 'string') {
          message = res.message;
        }
        if (res.errors !== undefined) errors = res.errors;
      }
      return { status, title, message, ...(errors !== undefined ? { errors } : {}) };
    }

    if (exception instanceof MongooseError.ValidationError) {
      const messages = Object.values(exception.errors).map((e) => e.message);
      return {
        status: HttpStatus.BAD_REQUEST,
        title: statusTitle(HttpStatus.BAD_REQUEST),
        message: messages.length > 0 ? messages.join(', ') : 'Validation failed',
        errors: messages,
      };
    }

    if (exception instanceof MongooseError.CastError) {
      return {
        status: HttpStatus.BAD_REQUEST,
        title: statusTitle(HttpStatus.BAD_REQUEST),
        message: `Invalid value for ${exception.path}`,
      };
    }

    if (exception instanceof MongoServerError && exception.code === 11000) {
      const keyPattern: unknown = exception.keyPattern;
      const fields = isHttpExceptionObject(keyPattern) ? Object.keys(keyPattern).join(', ') : '';
      this.logger.warn(`Duplicate key conflict on ${fields || 'unknown index'}`);
      return {
        status: HttpStatus.CONFLICT,
        title: statusTitle(HttpStatus.CONFLICT),
        message: fields
          ? `Duplicate value for unique field(s): ${fields}`
          : 'Duplicate key conflict',
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      title: statusTitle(HttpStatus.INTERNAL_SERVER_ERROR),
      message: exception instanceof Error ? exception.message : 'Internal Server Error',
    };
  }
}
