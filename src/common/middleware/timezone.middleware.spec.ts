import { ConfigService } from '@nestjs/config';
import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import type { AppConfig } from '../../config/env';
import { ValidationError } from '../errors/scheduling.errors';
import {
  TimezoneMiddleware,
  type TimezoneAwareRequest,
} from './timezone.middleware';

describe('TimezoneMiddleware', () => {
  const middleware = new TimezoneMiddleware(
    new ConfigService<AppConfig, true>({ DEFAULT_TIMEZONE: 'Europe/Lisbon' }),
  );

  const requestWith = (header?: string): TimezoneAwareRequest => {
    const req: TimezoneAwareRequest = new IncomingMessage(new Socket());
    if (header !== undefined) req.headers['x-timezone'] = header;
    return req;
  };
  const res = new ServerResponse(new IncomingMessage(new Socket()));

  it('uses the header timezone', () => {
    const req = requestWith('Asia/Kolkata');
    const next = jest.fn();

    middleware.use(req, res, next);

    expect(req.timezone).toBe('Asia/Kolkata');
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('falls back to the configured default', () => {
    const req = requestWith();
    const next = jest.fn();

    middleware.use(req, res, next);

    expect(req.timezone).toBe('Europe/Lisbon');
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('rejects unknown zones', () => {
    const next = jest.fn();

    expect(() => middleware.use(requestWith('Nowhere/City'), res, next)).toThrow(
      ValidationError,
    );
    expect(next).not.toHaveBeenCalled();
  });
});
