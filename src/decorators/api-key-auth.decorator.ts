import { UseGuards, applyDecorators } from '@nestjs/common';
import { ApiKeyGuard } from '../guards/api-key.guard';

/**
 * Requires a valid key in the configured header on every route it covers.
 *
 * @example
 * ```typescript
 * @ApiKeyAuth()
 * @Controller('items')
 * export class ItemsController {}
 * ```
 */
export const ApiKeyAuth = (): ReturnType<typeof applyDecorators> =>
  applyDecorators(UseGuards(ApiKeyGuard));
