import { ExecutionContext, createParamDecorator } from '@nestjs/common';

import type { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

/**
 * The owner `ApiTokenGuard` resolved for this request.
 */
export const Owner = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string =>
    context.switchToHttp().getRequest<AuthenticatedRequest>().owner,
);
