// Access policy — who holds which permission where
export type { AccessGrant, AccessPolicy } from './access-policy.js';
export { SYSTEM_ONLY_POLICY, createGrantAccessPolicy } from './access-policy.js';
