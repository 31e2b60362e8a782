import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: unknown;
  [key: string]: unknown;
}

const DEFAULT_ERROR_CODES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'validation_error',
  [HttpStatus.UNAUTHORIZED]: 'unauthorized',
  [HttpStatus.FORBIDDEN]: 'forbidden',
  [HttpStatus.NOT_FOUND]: 'not_found',
  [HttpStatus.CONFLICT]: 'scheduling_conflict',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'invalid_state',
  [HttpStatus.BAD_GATEWAY]: 'external_service_error',
};

const RESERVED_KEYS = ['statusCode', 'error', 'message'];
const MACHINE_CODE = /^[a-z_]+$/;

/** Shapes any error into `{ statusCode, error, message, ...details }`. */
export function toErrorBody(exception: unknown): ErrorBody {
  if (!(exception instanceof HttpException)) {
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'internal_error',
      message: 'Internal server error',
    };
  }

  const statusCode = exception.getStatus();
  const fallbackCode = DEFAULT_ERROR_CODES[statusCode] ?? 'http_error';
  const response = exception.getResponse();

  if (typeof response === 'string') {
    return { statusCode, error: fallbackCode, message: response };
  }

  const error = 'error' in response ? response.error : undefined;
  const message = 'message' in response ? response.message : undefined;
  const details = Object.fromEntries(
    Object.entries(response).filter(
      ([key]) => !RESERVED_KEYS.includes(key),
    ),
  );

  return {
    ...details,
    statusCode,
    // Nest's own exceptions carry a title such as "Bad Request"; only
    // machine-readable codes are passed through.
    error:
      typeof error === 'string' && MACHINE_CODE.test(error)
        ? error
        : fallbackCode,
    message: message ?? exception.message,
  };
}

@Catch()
export class SchedulingExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(SchedulingExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const body = toErrorBody(exception);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        exception instanceof Error ? exception.stack ?? exception.message : String(exception),
      );
    }

    void response.status(body.statusCode).send(body);
  }
}
