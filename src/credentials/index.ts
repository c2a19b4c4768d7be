// Credentials — model, identifier rules, type table
export type {
  Credential,
  CredentialInput,
  CredentialTypeDefinition,
  ExternalSecretRef,
  SealedSecretRef,
  SecretRef,
} from './types.js';
export {
  createCredential,
  credentialName,
  isParameterExpression,
  parameterNameOf,
  validateCredentialId,
} from './credential.js';
export {
  BUILTIN_CREDENTIAL_TYPES,
  ROOT_CREDENTIAL_TYPE,
  isAssignableType,
  typeLineage,
} from './credential-types.js';
