import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { LedgerError, LedgerErrorCode } from '../errors/ledger.errors';

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string | string[];
  path: string;
  timestamp: string;
}

const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, HttpStatus> = {
  ACCOUNT_NOT_FOUND: HttpStatus.NOT_FOUND,
  INSUFFICIENT_FUNDS: HttpStatus.BAD_REQUEST,
  INVALID_TRANSACTION: HttpStatus.BAD_REQUEST,
};

/**
 * HttpExceptionFilter
 *
 * Renders every error with the same body shape.
 * Ledger rejections are mapped to 404/400, anything unknown becomes a logged 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { statusCode, error, message } = this.describe(exception);

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed: ${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const body: ErrorResponseBody = {
      statusCode,
      error,
      message,
      path: request.url,
      timestamp: new Date().toISOString(),
    };

    response.status(statusCode).json(body);
  }

  private describe(exception: unknown): Pick<ErrorResponseBody, 'statusCode' | 'error' | 'message'> {
    if (exception instanceof LedgerError) {
      return {
        statusCode: LEDGER_ERROR_STATUS[exception.code],
        error: exception.code,
        message: exception.message,
      };
    }

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const payload = exception.getResponse();

      if (typeof payload === 'object' && payload !== null) {
        const message = 'message' in payload ? payload.message : undefined;
        const error = 'error' in payload ? payload.error : undefined;
        return {
          statusCode,
          error: typeof error === 'string' ? error : exception.name,
          message: isMessage(message) ? message : exception.message,
        };
      }

      return { statusCode, error: exception.name, message: String(payload) };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'Internal Server Error',
      message: 'Internal server error',
    };
  }
}

function isMessage(value: unknown): value is string | string[] {
  return (
    typeof value === 'string' ||
    (Array.isArray(value) && value.every((item) => typeof item === 'string'))
  );
}
