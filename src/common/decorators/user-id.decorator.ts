import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { UnauthorizedError } from '../errors/game-errors.js';

/** Requires AuthGuard on the route */
export const UserId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<Request>();
    if (!req.userId) {
      throw new UnauthorizedError('No authenticated user on request');
    }
    return req.userId;
  },
);
