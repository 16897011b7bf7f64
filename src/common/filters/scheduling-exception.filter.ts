import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import {
  isSchedulingErrorCode,
  type SchedulingErrorCode,
} from '../errors/scheduling.exceptions.js';

const DEFAULT_CODES: Partial<Record<number, SchedulingErrorCode | 'unauthorized'>> = {
  [HttpStatus.BAD_REQUEST]: 'validation_error',
  [HttpStatus.UNAUTHORIZED]: 'unauthorized',
  [HttpStatus.FORBIDDEN]: 'forbidden',
  [HttpStatus.NOT_FOUND]: 'not_found',
  [HttpStatus.CONFLICT]: 'slot_unavailable',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'invalid_state',
};

/** Renders every error as `{ statusCode, error, message, ... }` with a stable `error` code. */
@Catch()
export class SchedulingExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(SchedulingExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<FastifyReply>();

    if (!(exception instanceof HttpException)) {
      this.logger.error(
        'Unhandled error',
        exception instanceof Error ? exception.stack : String(exception),
      );
      void response.status(HttpStatus.INTERNAL_SERVER_ERROR).send({
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'internal_error',
        message: 'Internal server error',
      });
      return;
    }

    const status = exception.getStatus();
    const exceptionResponse = exception.getResponse();
    const payload =
      typeof exceptionResponse === 'string'
        ? { message: exceptionResponse }
        : exceptionResponse;
    const ownCode = 'error' in payload ? payload.error : undefined;
    const error = isSchedulingErrorCode(ownCode)
      ? ownCode
      : (DEFAULT_CODES[status] ?? 'error');

    void response.status(status).send({ ...payload, statusCode: status, error });
  }
}
