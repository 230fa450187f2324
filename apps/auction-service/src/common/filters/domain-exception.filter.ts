import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response, Request } from 'express';
import { DomainError } from '@gemhouse/shared';

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details: unknown;
    timestamp: string;
    path: string;
    statusCode: number;
    requestId?: string;
  };
}

const STATUS_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  422: 'UNPROCESSABLE_ENTITY',
  429: 'TOO_MANY_REQUESTS',
  502: 'BAD_GATEWAY',
  503: 'SERVICE_UNAVAILABLE',
};

@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toBody(exception, request);
    const { statusCode, message } = body.error;

    if (statusCode >= 500) {
      this.logger.error(
        `${statusCode} ${message} - ${request.method} ${request.url}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${statusCode} ${message} - ${request.method} ${request.url}`);
    }

    response.status(statusCode).json(body);
  }

  toBody(exception: unknown, request: Request): ErrorResponse {
    const requestId = request.headers['x-request-id'];
    const base = {
      timestamp: new Date().toISOString(),
      path: request.url,
      requestId: typeof requestId === 'string' ? requestId : undefined,
    };

    if (exception instanceof DomainError) {
      return {
        success: false,
        error: {
          ...base,
          code: exception.code,
          message: exception.message,
          details: Object.keys(exception.details).length > 0 ? exception.details : null,
          statusCode: exception.getStatus(),
        },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const payload = exception.getResponse();
      // ValidationPipe reports one message per failed constraint.
      const messages =
        typeof payload === 'object' && 'message' in payload && Array.isArray(payload.message)
          ? payload.message
          : null;
      return {
        success: false,
        error: {
          ...base,
          code: STATUS_CODES[status] ?? `HTTP_${status}`,
          message: messages ? 'Validation failed' : exception.message,
          details: messages,
          statusCode: status,
        },
      };
    }

    return {
      success: false,
      error: {
        ...base,
        code: 'UNEXPECTED_ERROR',
        message: 'Internal server error',
        details: null,
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      },
    };
  }
}
