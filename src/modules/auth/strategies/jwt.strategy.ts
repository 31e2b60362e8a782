import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import type { AppConfig } from '../../../config/env.js';
import { isUserRole, toPrincipal, type Principal } from '../principal.js';

interface JwtPayload {
  sub?: unknown;
  role?: unknown;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService<AppConfig, true>) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get('JWT_SECRET', { infer: true }),
    });
  }

  validate(payload: JwtPayload): Principal {
    if (typeof payload.sub !== 'string' || !isUserRole(payload.role)) {
      throw new UnauthorizedException('Token is missing subject or role');
    }
    return toPrincipal(payload.sub, payload.role);
  }
}
