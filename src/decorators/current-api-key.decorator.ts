import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { ApiKey, AuthenticatedRequest } from '../interfaces';

/**
 * Resolves the key record `ApiKeyGuard` attached to the request.
 */
export const CurrentApiKey = createParamDecorator(
  (_data: unknown, context: ExecutionContext): ApiKey | undefined =>
    context.switchToHttp().getRequest<AuthenticatedRequest>().apiKey,
);
