import { HttpStatus } from '@nestjs/common';
import type { ClientUnavailableReason } from '../llm/llm-client';

export type ChatErrorKind =
  | 'InvalidInput'
  | 'ConfigurationError'
  | 'UpstreamCallError'
  | 'EmptyUpstreamResponse';

/**
 * Failures of a single chat round trip. Each maps to one HTTP status and is
 * reported to the caller as `{ error: message }`.
 */
export abstract class ChatError extends Error {
  abstract readonly kind: ChatErrorKind;
  abstract readonly statusCode: HttpStatus;
}

export class InvalidInputError extends ChatError {
  readonly kind = 'InvalidInput';
  readonly statusCode = HttpStatus.BAD_REQUEST;
}

export class ConfigurationError extends ChatError {
  readonly kind = 'ConfigurationError';
  readonly statusCode = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(
    readonly reason: ClientUnavailableReason,
    message: string,
  ) {
    super(message);
  }
}

export class UpstreamCallError extends ChatError {
  readonly kind = 'UpstreamCallError';
  readonly statusCode = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(provider: string, cause: string) {
    super(`Failed to retrieve response from ${provider}: ${cause}`);
  }
}

export class EmptyUpstreamResponseError extends ChatError {
  readonly kind = 'EmptyUpstreamResponse';
  readonly statusCode = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(provider: string) {
    super(`Empty response from ${provider}.`);
  }
}
