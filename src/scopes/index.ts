export type { CredentialsScope } from './scope.js';
export {
  CREDENTIALS_SCOPES,
  isCredentialsScope,
  isScopeVisible,
  parseScope,
  scopeDisplayName,
  visibleScopes,
} from './scope.js';
