import { Injectable, NestMiddleware } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { AppConfig } from '../../config/env.js';
import { ValidationError } from '../errors/scheduling.errors.js';
import { isValidTimezone } from '../time/zoned-time.js';

export const TIMEZONE_HEADER = 'x-timezone';

export type TimezoneAwareRequest = IncomingMessage & { timezone?: string };

/**
 * Resolves the wall-clock timezone of the request from `X-Timezone`, falling
 * back to DEFAULT_TIMEZONE. Handlers receive it through `@RequestTimezone()`.
 */
@Injectable()
export class TimezoneMiddleware implements NestMiddleware {
  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  use(req: TimezoneAwareRequest, _res: ServerResponse, next: () => void) {
    const header = req.headers[TIMEZONE_HEADER];
    const requested = Array.isArray(header) ? header[0] : header;

    if (requested === undefined || requested.trim() === '') {
      req.timezone = this.config.get('DEFAULT_TIMEZONE', { infer: true });
      next();
      return;
    }

    if (!isValidTimezone(requested)) {
      throw new ValidationError(`X-Timezone "${requested}" is not a known IANA timezone`);
    }

    req.timezone = requested;
    next();
  }
}
