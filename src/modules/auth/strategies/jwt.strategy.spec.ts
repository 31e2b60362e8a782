import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../../config/env';
import { JwtStrategy } from './jwt.strategy';

describe('JwtStrategy', () => {
  const strategy = new JwtStrategy(
    new ConfigService<AppConfig, true>({ JWT_SECRET: 'test-secret' }),
  );

  it('maps token claims to a principal', () => {
    expect(strategy.validate({ sub: 'doctor-1', role: 'doctor' })).toEqual({
      role: 'doctor',
      id: 'doctor-1',
    });
  });

  it('rejects tokens with an unknown role', () => {
    expect(() => strategy.validate({ sub: 'user-1', role: 'staff' })).toThrow(
      UnauthorizedException,
    );
  });

  it('rejects tokens without a subject', () => {
    expect(() => strategy.validate({ role: 'patient' })).toThrow(
      UnauthorizedException,
    );
  });
});
