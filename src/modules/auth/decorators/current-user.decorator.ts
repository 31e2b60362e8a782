import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import type { Principal } from '../principal.js';

export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Principal => {
    const request = ctx
      .switchToHttp()
      .getRequest<FastifyRequest & { user?: Principal }>();
    if (!request.user) {
      throw new UnauthorizedException();
    }
    return request.user;
  },
);
