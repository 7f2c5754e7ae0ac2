import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { Request } from 'express';
import { UnauthorizedError } from '../errors/game-errors.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      userId?: string;
    }
  }
}

type TokenPayload = { sub: string };

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private readonly jwtService: JwtService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();

    // 1. Bearer token
    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
      const token = authHeader.slice(7);
      let payload: TokenPayload;
      try {
        payload = this.jwtService.verify<TokenPayload>(token);
      } catch {
        throw new UnauthorizedError('Invalid or expired token');
      }
      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        throw new UnauthorizedError('Token has no subject');
      }
      req.userId = payload.sub;
      return true;
    }

    // 2. Dev fallback: x-user-id (non-production only)
    if (process.env.NODE_ENV !== 'production') {
      const userId = req.headers['x-user-id'];
      if (typeof userId === 'string' && userId.length > 0) {
        req.userId = userId;
        return true;
      }
    }

    throw new UnauthorizedError(
      'Authorization header with Bearer token is required',
    );
  }
}
