import {
  ConflictException,
  NotFoundException,
  ServiceUnavailableException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';

export const INVALID_API_KEY_MESSAGE = 'Invalid API key';

export interface FieldError {
  field: string;
  message: string;
}

/**
 * The single outward signal for every failed key validation. Callers must not
 * be able to tell which step rejected the key.
 */
export class InvalidApiKeyException extends UnauthorizedException {
  constructor() {
    super(INVALID_API_KEY_MESSAGE);
  }
}

export class ApiKeyNotFoundException extends NotFoundException {
  constructor(id?: string) {
    super(id ? `API key with ID "${id}" not found` : 'API key not found');
  }
}

export class ItemNotFoundException extends NotFoundException {
  constructor() {
    super('Item not found');
  }
}

export class ApiKeyConflictException extends ConflictException {
  constructor(detail = 'An API key with this name already exists for this client') {
    super(detail);
  }
}

export class ValidationFailedException extends UnprocessableEntityException {
  readonly errors: FieldError[];

  constructor(errors: FieldError[]) {
    super({
      statusCode: 422,
      message: 'Validation failed',
      errors,
    });
    this.errors = errors;
  }
}

export class StoreUnavailableException extends ServiceUnavailableException {
  constructor(message = 'Service temporarily unavailable') {
    super(message);
  }
}
