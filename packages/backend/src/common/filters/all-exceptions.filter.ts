import {
  Catch,
  ArgumentsHost,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { RollcallError, RollcallErrorCode } from '../errors/rollcall.errors';

const STATUS_BY_CODE: Record<RollcallErrorCode, HttpStatus> = {
  UNREGISTERED_SENDER: HttpStatus.FORBIDDEN,
  NO_RECIPIENTS: HttpStatus.CONFLICT,
  TRANSPORT_FAILURE: HttpStatus.BAD_GATEWAY,
  LEDGER_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  ATTACHMENT_PROCESSING_FAILURE: HttpStatus.UNPROCESSABLE_ENTITY,
};

export interface ErrorBody {
  statusCode: number;
  error: unknown;
  path: string;
  timestamp: string;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();

    let status: number;
    let error: unknown;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      error = exception.getResponse();
    } else if (exception instanceof RollcallError) {
      status = STATUS_BY_CODE[exception.code];
      // Storage details stay in the log
      error = exception.code === 'LEDGER_UNAVAILABLE'
        ? { code: exception.code, message: 'Service temporarily unavailable' }
        : { code: exception.code, message: exception.message };
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      error = { message: 'Internal server error' };
    }

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        'HTTP error:',
        exception instanceof Error ? exception.stack : String(exception)
      );
    }

    const body: ErrorBody = {
      statusCode: status,
      error,
      path: String(httpAdapter.getRequestUrl(ctx.getRequest())),
      timestamp: new Date().toISOString()
    };
    httpAdapter.reply(ctx.getResponse(), body, status);
  }
}
