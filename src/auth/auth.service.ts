import { Injectable, UnauthorizedException } from '@nestjs/common';
import { createHmac, timingSafeEqual } from 'crypto';
import type { Request } from 'express';

import { AppConfigService } from '@libs/config';

import { OWNER_PATTERN } from './constants';

type TokenSource = Pick<Request, 'headers' | 'query'>;

/**
 * Stateless API tokens: `<owner>.<hex HMAC-SHA256(secret, owner)>`.
 */
@Injectable()
export class AuthService {
  constructor(private readonly appConfig: AppConfigService) {}

  public signToken(owner: string): string {
    if (!OWNER_PATTERN.test(owner)) {
      throw new Error(`Invalid owner name "${owner}"`);
    }
    return `${owner}.${this.signature(owner)}`;
  }

  /**
   * @returns the owner the token was issued to, or null when the token is
   * malformed or its signature does not match.
   */
  public verifyToken(token: string): string | null {
    const separator = token.lastIndexOf('.');
    if (separator <= 0) {
      return null;
    }

    const owner = token.slice(0, separator);
    const signature = token.slice(separator + 1);
    if (!OWNER_PATTERN.test(owner) || !/^[0-9a-f]{64}$/.test(signature)) {
      return null;
    }

    const expected = Buffer.from(this.signature(owner), 'hex');
    const actual = Buffer.from(signature, 'hex');
    return timingSafeEqual(expected, actual) ? owner : null;
  }

  /**
   * Reads the token from `Authorization: Bearer` or, for EventSource
   * clients that cannot set headers, from `?token=`.
   */
  public ownerFromRequest(req: TokenSource): string {
    const token = this.tokenFromRequest(req);
    if (!token) {
      throw new UnauthorizedException('Missing token');
    }

    const owner = this.verifyToken(token);
    if (!owner) {
      throw new UnauthorizedException('Invalid API token');
    }
    return owner;
  }

  private tokenFromRequest(req: TokenSource): string | null {
    const auth = req.headers.authorization;
    if (auth?.startsWith('Bearer ')) {
      return auth.slice(7).trim() || null;
    }

    const query: unknown = req.query.token;
    return typeof query === 'string' && query.length > 0 ? query : null;
  }

  private signature(owner: string): string {
    return createHmac('sha256', this.appConfig.secretKey)
      .update(owner)
      .digest('hex');
  }
}
