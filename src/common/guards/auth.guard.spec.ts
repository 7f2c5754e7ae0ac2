import { JwtService } from '@nestjs/jwt';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { AuthGuard } from './auth.guard.js';
import { UnauthorizedError } from '../errors/game-errors.js';

type FakeRequest = { headers: Record<string, string>; userId?: string };

describe('AuthGuard', () => {
  const jwt = new JwtService({ secret: 'test-secret' });
  const guard = new AuthGuard(jwt);

  function activate(req: FakeRequest): boolean {
    return guard.canActivate(new ExecutionContextHost([req]));
  }

  it('accepts a signed bearer token', () => {
    const req: FakeRequest = { headers: { authorization: `Bearer ${jwt.sign({ sub: 'user-1' })}` } };
    expect(activate(req)).toBe(true);
    expect(req.userId).toBe('user-1');
  });

  it('rejects a token signed with another secret', () => {
    const forged = new JwtService({ secret: 'other-secret' }).sign({ sub: 'user-1' });
    expect(() => activate({ headers: { authorization: `Bearer ${forged}` } })).toThrow(UnauthorizedError);
  });

  it('accepts x-user-id outside production', () => {
    const req: FakeRequest = { headers: { 'x-user-id': 'dev-user' } };
    expect(activate(req)).toBe(true);
    expect(req.userId).toBe('dev-user');
  });

  it('rejects a request with no credentials', () => {
    expect(() => activate({ headers: {} })).toThrow(UnauthorizedError);
  });
});
