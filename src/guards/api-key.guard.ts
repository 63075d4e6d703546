import { Injectable, CanActivate, ExecutionContext, Inject } from '@nestjs/common';
import { Response } from 'express';
import { ApiKeyService } from '../services/api-key.service';
import { ApiKeyModuleOptions, AuthenticatedRequest } from '../interfaces';
import { InvalidApiKeyException } from '../exceptions';
import { API_KEY_OPTIONS, DEFAULT_HEADER_NAME, CORRELATION_ID_HEADER } from '../api-key.constants';

/**
 * Guard that validates the API key sent in the configured header.
 * Attaches the validated key record to the request for use in controllers.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(
    private readonly apiKeyService: ApiKeyService,
    @Inject(API_KEY_OPTIONS) private readonly options: ApiKeyModuleOptions,
  ) {}

  /**
   * @throws {InvalidApiKeyException} If the key is missing or fails validation
   */
  async canActivate(context: ExecutionContext): Promise<boolean> {
    const http = context.switchToHttp();
    const request = http.getRequest<AuthenticatedRequest>();
    const response = http.getResponse<Response>();

    const presented = this.extractApiKey(request);
    const apiKey = await this.apiKeyService.validate(presented, {
      correlationId: firstHeaderValue(request.headers[CORRELATION_ID_HEADER]),
    });

    if (!apiKey) {
      response.setHeader('WWW-Authenticate', 'ApiKey');
      throw new InvalidApiKeyException();
    }

    request.apiKey = apiKey;
    return true;
  }

  private extractApiKey(request: AuthenticatedRequest): string | undefined {
    // Node lower-cases incoming header names.
    const headerName = (this.options.headerName || DEFAULT_HEADER_NAME).toLowerCase();
    return firstHeaderValue(request.headers[headerName]);
  }
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
