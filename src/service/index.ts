// Credentials service — public entry point
export type { CredentialsService, CredentialsServiceDeps } from './credentials-service.js';
export { createCredentialsService } from './credentials-service.js';
