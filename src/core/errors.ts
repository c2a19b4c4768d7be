/**
 * Base error class for all credentials-core errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class CredentialsError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'CredentialsError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when input validation (Zod or identifier rules) fails. */
export class ValidationError extends CredentialsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Thrown by explicit administrative operations when the principal lacks a permission.
 * Read paths never throw this; they return empty results instead.
 */
export class PermissionDeniedError extends CredentialsError {
  constructor(principalId: string, permission: string, target: string) {
    super({
      message: `Principal "${principalId}" lacks permission "${permission}" on ${target}`,
      code: 'PERMISSION_DENIED',
      statusCode: 403,
      context: { principalId, permission, target },
    });
    this.name = 'PermissionDeniedError';
  }
}

/** Thrown when a store is used after its backing provider was deregistered. */
export class ProviderMissingError extends CredentialsError {
  constructor(providerId: string, storeId: string) {
    super({
      message: `Provider "${providerId}" backing store "${storeId}" is no longer registered`,
      code: 'PROVIDER_MISSING',
      statusCode: 500,
      context: { providerId, storeId },
      isOperational: false,
    });
    this.name = 'ProviderMissingError';
  }
}

/** Thrown when a provider or remote secret call exceeds its time bound. */
export class ProviderTimeoutError extends CredentialsError {
  constructor(operation: string, timeoutMs: number) {
    super({
      message: `${operation} timed out after ${timeoutMs.toString()}ms`,
      code: 'PROVIDER_TIMEOUT',
      statusCode: 504,
      context: { operation, timeoutMs },
    });
    this.name = 'ProviderTimeoutError';
  }
}

/** Thrown when a mutation is attempted on a read-only store. */
export class StoreNotModifiableError extends CredentialsError {
  constructor(storeId: string, operation: string) {
    super({
      message: `Store "${storeId}" does not support ${operation}`,
      code: 'STORE_NOT_MODIFIABLE',
      statusCode: 405,
      context: { storeId, operation },
    });
    this.name = 'StoreNotModifiableError';
  }
}

/** Returned when a credential's secret cannot be resolved or decrypted. */
export class CredentialUnavailableError extends CredentialsError {
  constructor(credentialId: string, reason: string, cause?: Error) {
    super({
      message: `Credential "${credentialId}" is unavailable: ${reason}`,
      code: 'CREDENTIAL_UNAVAILABLE',
      statusCode: 503,
      cause,
      context: { credentialId },
    });
    this.name = 'CredentialUnavailableError';
  }
}

/** The `code` of a Node.js system error (e.g. `ENOENT`), if any. */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
