// Credential usage tracking
export type { UsageRecord, UsageRepository } from './types.js';
export type { UsageTracker } from './usage-tracker.js';
export { createUsageTracker, fingerprintOf } from './usage-tracker.js';
export { createInMemoryUsageRepository } from './memory-usage-repository.js';
