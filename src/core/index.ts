// Core module — shared types, errors, Result, bounded calls
export type {
  CredentialsContext,
  JobContext,
  KnownContextKind,
  Permission,
  Principal,
  PrincipalKind,
  UserContext,
} from './types.js';
export { ANONYMOUS_PRINCIPAL, SYSTEM_PRINCIPAL, userPrincipal } from './types.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';

export {
  CredentialsError,
  CredentialUnavailableError,
  PermissionDeniedError,
  ProviderMissingError,
  ProviderTimeoutError,
  StoreNotModifiableError,
  ValidationError,
  systemErrorCode,
} from './errors.js';

export { withTimeout } from './timeout.js';
