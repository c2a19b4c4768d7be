// credentials-core public API
export * from './core/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './contexts/index.js';
export * from './scopes/index.js';
export * from './credentials/index.js';
export * from './domains/index.js';
export * from './security/index.js';
export * from './stores/index.js';
export * from './providers/index.js';
export * from './resolution/index.js';
export * from './bindings/index.js';
export * from './merge/index.js';
export * from './tracking/index.js';
export * from './secrets/index.js';
export * from './service/index.js';
