import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import { getRequestId } from '../http/request-id';
import { ErrorItem, fail } from '../http/response.envelope';
import { AnalysisError, AnalysisErrorKind } from './analysis-errors';

export const STATUS_BY_KIND: Record<AnalysisErrorKind, HttpStatus> = {
  InvalidImageError: HttpStatus.BAD_REQUEST,
  SchemaValidationError: HttpStatus.BAD_GATEWAY,
  ModelUnavailableError: HttpStatus.SERVICE_UNAVAILABLE,
  IncompleteInputError: HttpStatus.INTERNAL_SERVER_ERROR,
  AnalysisCancelledError: HttpStatus.REQUEST_TIMEOUT,
};

const CODE_BY_STATUS: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'BadRequest',
  [HttpStatus.NOT_FOUND]: 'NotFound',
  [HttpStatus.REQUEST_TIMEOUT]: 'RequestTimeout',
  [HttpStatus.PAYLOAD_TOO_LARGE]: 'PayloadTooLarge',
};

const errorsFromBody = (
  body: string | object,
  status: number,
  fallbackMessage: string,
): ErrorItem[] => {
  const fallbackCode = CODE_BY_STATUS[status] ?? 'HttpError';
  if (typeof body === 'string') return [{ code: fallbackCode, message: body }];

  const code =
    'code' in body && typeof body.code === 'string' ? body.code : fallbackCode;
  const message = 'message' in body ? body.message : undefined;

  // ValidationPipe reports one message per failed constraint.
  if (Array.isArray(message)) {
    return message
      .filter((m): m is string => typeof m === 'string')
      .map((m) => ({ code, message: m }));
  }

  return [
    { code, message: typeof message === 'string' ? message : fallbackMessage },
  ];
};

/**
 * Renders every error leaving a controller in the response envelope, so
 * clients always get a failure kind instead of a bare status.
 */
@Catch()
export class EnvelopeExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(EnvelopeExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();
    const requestId = getRequestId(req);

    const { status, errors } = this.describe(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        { event: 'request_failed', request_id: requestId, status, errors },
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    res.status(status).json(fail(errors, requestId));
  }

  private describe(exception: unknown): {
    status: number;
    errors: ErrorItem[];
  } {
    if (exception instanceof AnalysisError) {
      return {
        status: STATUS_BY_KIND[exception.kind],
        errors: [{ code: exception.kind, message: exception.message }],
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        status,
        errors: errorsFromBody(
          exception.getResponse(),
          status,
          exception.message,
        ),
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      errors: [
        { code: 'InternalError', message: 'An internal error occurred' },
      ],
    };
  }
}
