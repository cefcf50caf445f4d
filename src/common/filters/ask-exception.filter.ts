import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { AskError } from '../errors/ask.errors';

export interface ErrorBody {
  error: string;
  message: string;
  details?: object;
}

/**
 * Converts every exception raised while serving HTTP into a JSON
 * `{ error, message }` body. Callers never see a stack trace.
 */
@Catch()
export class AskExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AskExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.toErrorResponse(exception);
    response.status(status).json(body);
  }

  toErrorResponse(exception: unknown): { status: number; body: ErrorBody } {
    if (exception instanceof AskError) {
      this.logger.warn(`${exception.kind} (${exception.status}): ${exception.message}`);
      return {
        status: exception.status,
        body: { error: exception.kind, message: exception.message },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const response = exception.getResponse();
      const body: ErrorBody = {
        error: status === HttpStatus.BAD_REQUEST ? 'ValidationError' : exception.name,
        message: this.httpExceptionMessage(exception),
      };
      // Health reports and similar structured bodies travel as details.
      if (typeof response === 'object' && !('message' in response)) {
        body.details = response;
      }
      return { status, body };
    }

    this.logger.error(
      `❌ Unhandled error: ${exception instanceof Error ? exception.message : String(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { error: 'InternalError', message: 'internal server error' },
    };
  }

  private httpExceptionMessage(exception: HttpException): string {
    const response = exception.getResponse();
    if (typeof response === 'string') {
      return response;
    }
    if ('message' in response) {
      const { message } = response;
      if (Array.isArray(message)) {
        return message.join('; ');
      }
      if (typeof message === 'string') {
        return message;
      }
    }
    return exception.message;
  }
}
