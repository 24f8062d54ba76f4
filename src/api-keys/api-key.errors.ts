import { AppError } from '../utils/app-error';

export class MissingCredentialError extends AppError {
  constructor() {
    super('Missing API key');
  }
}

export class InvalidKeyError extends AppError {
  constructor() {
    super('Invalid API key');
  }
}

export class ExpiredKeyError extends AppError {
  constructor() {
    super('API key expired');
  }
}

export class DuplicateKeyError extends AppError {
  constructor() {
    super('API key already exists');
  }
}

export class KeyNotFoundError extends AppError {
  constructor() {
    super('API key not found');
  }
}

export class StoreUnavailableError extends AppError {
  constructor(cause?: unknown) {
    super('Key store unavailable', { cause });
  }
}

export class TokenGenerationExhaustedError extends AppError {
  constructor(attempts: number) {
    super(`Could not generate a unique API key after ${attempts} attempts`);
  }
}

export class InvalidKeyRequestError extends AppError {}
