import {
  createParamDecorator,
  ExecutionContext,
  InternalServerErrorException,
} from '@nestjs/common';
import type { TimezoneAwareRequest } from '../middleware/timezone.middleware.js';

export interface TimezoneCarrier {
  raw?: TimezoneAwareRequest;
  timezone?: string;
}

/** The timezone TimezoneMiddleware stored on the request. */
export function resolveRequestTimezone(request: TimezoneCarrier): string {
  const timezone = request.raw?.timezone ?? request.timezone;
  if (timezone === undefined) {
    throw new InternalServerErrorException(
      'Request timezone was not resolved; TimezoneMiddleware must run for this route',
    );
  }
  return timezone;
}

export const RequestTimezone = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string =>
    resolveRequestTimezone(ctx.switchToHttp().getRequest<TimezoneCarrier>()),
);
