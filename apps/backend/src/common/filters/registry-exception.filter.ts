import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';

import { RegistryError, RegistryErrorKind } from '../../registry/ledger/errors';

const STATUS_BY_KIND: Record<RegistryErrorKind, HttpStatus> = {
  validation: HttpStatus.BAD_REQUEST,
  authorization: HttpStatus.FORBIDDEN,
  'not-found': HttpStatus.NOT_FOUND,
  conflict: HttpStatus.CONFLICT,
};

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  code: string | null;
  message: string | string[];
  details: Record<string, unknown> | null;
  path: string;
  method: string;
  timestamp: string;
}

@Catch()
export class RegistryExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RegistryExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body: ErrorResponseBody = {
      ...this.describe(exception),
      path: request.url,
      method: request.method,
      timestamp: new Date().toISOString(),
    };

    if (body.statusCode >= 500) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`${request.method} ${request.url} -> ${body.statusCode} ${body.error}`, stack);
    } else {
      this.logger.warn(`${request.method} ${request.url} -> ${body.statusCode} ${body.code ?? body.error}`);
    }

    response.status(body.statusCode).json(body);
  }

  private describe(exception: unknown): Pick<ErrorResponseBody, 'statusCode' | 'error' | 'code' | 'message' | 'details'> {
    if (exception instanceof RegistryError) {
      return {
        statusCode: STATUS_BY_KIND[exception.kind],
        error: exception.name,
        code: exception.code,
        message: exception.message,
        details: exception.details ?? null,
      };
    }

    if (exception instanceof HttpException) {
      const payload = exception.getResponse();
      let message: string | string[] = exception.message;
      if (typeof payload === 'string') {
        message = payload;
      } else if ('message' in payload) {
        // ValidationPipe reports one message per failed constraint
        if (Array.isArray(payload.message)) {
          message = payload.message.map(String);
        } else if (typeof payload.message === 'string') {
          message = payload.message;
        }
      }

      return {
        statusCode: exception.getStatus(),
        error: exception.name,
        code: null,
        message,
        details: null,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'InternalServerError',
      code: null,
      message: 'Internal server error',
      details: null,
    };
  }
}
