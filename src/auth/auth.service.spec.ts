import { UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import type { Request } from 'express';

import { AppConfigService } from '@libs/config';

import { createTestConfigService } from '../testing/test-data-source';
import { AuthService } from './auth.service';
import { Public } from './decorators/public.decorator';
import { ApiTokenGuard } from './guards/api-token.guard';

class ProbeController {
  @Public()
  health(): void {}

  list(): void {}
}

interface ProbeRequest {
  headers: Record<string, string>;
  query: Record<string, string>;
  owner?: string;
}

function request(
  headers: Record<string, string> = {},
  query: Record<string, string> = {},
): ProbeRequest {
  return { headers, query };
}

describe('AuthService', () => {
  const authService = new AuthService(
    new AppConfigService(createTestConfigService()),
  );

  it('verifies the tokens it signs', () => {
    const token = authService.signToken('alice');

    expect(token).toMatch(/^alice\.[0-9a-f]{64}$/);
    expect(authService.verifyToken(token)).toBe('alice');
  });

  it('rejects a token signed with another key', () => {
    const other = new AuthService(
      new AppConfigService(
        createTestConfigService({ app: { secretKey: 'other-secret' } }),
      ),
    );

    expect(authService.verifyToken(other.signToken('alice'))).toBeNull();
  });

  it('rejects a signature moved to another owner', () => {
    const signature = authService.signToken('alice').split('.')[1];

    expect(authService.verifyToken(`bob.${signature}`)).toBeNull();
  });

  it.each(['', 'alice', 'alice.', '.abc', '../x.00', 'alice.xyz'])(
    'rejects the malformed token %j',
    (token) => {
      expect(authService.verifyToken(token)).toBeNull();
    },
  );

  it('refuses to sign an owner that is not a safe directory name', () => {
    expect(() => authService.signToken('../etc')).toThrow(
      'Invalid owner name "../etc"',
    );
  });

  describe('ApiTokenGuard', () => {
    const guard = new ApiTokenGuard(new Reflector(), authService);

    function contextFor(
      req: ProbeRequest,
      handler: () => void,
    ): ExecutionContextHost {
      return new ExecutionContextHost([req], ProbeController, handler);
    }

    it('lets public routes through without a token', () => {
      const req = request();

      expect(
        guard.canActivate(contextFor(req, ProbeController.prototype.health)),
      ).toBe(true);
      expect(req.owner).toBeUndefined();
    });

    it('resolves the owner from a bearer token', () => {
      const req = request({
        authorization: `Bearer ${authService.signToken('alice')}`,
      });

      expect(
        guard.canActivate(contextFor(req, ProbeController.prototype.list)),
      ).toBe(true);
      expect(req.owner).toBe('alice');
    });

    it('accepts the token as a query parameter', () => {
      const req = request({}, { token: authService.signToken('bob') });

      guard.canActivate(contextFor(req, ProbeController.prototype.list));

      expect(req.owner).toBe('bob');
    });

    it.each([
      [request(), 'Missing token'],
      [request({ authorization: 'Bearer nope' }), 'Invalid API token'],
    ])('rejects %j with "%s"', (req, message) => {
      const check = () =>
        guard.canActivate(contextFor(req, ProbeController.prototype.list));

      expect(check).toThrow(UnauthorizedException);
      expect(check).toThrow(message);
    });
  });

  it('reads nothing from a non-bearer authorization header', () => {
    const req: Pick<Request, 'headers' | 'query'> = {
      headers: { authorization: 'Basic abc' },
      query: {},
    };

    expect(() => authService.ownerFromRequest(req)).toThrow('Missing token');
  });
});
