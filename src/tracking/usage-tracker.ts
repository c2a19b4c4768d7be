/**
 * UsageTracker — idempotent association of credentials with the contexts using them.
 */
import { createHash } from 'node:crypto';

import type { CredentialsContext } from '@/core/types.js';
import type { Credential } from '@/credentials/types.js';
import type { Logger } from '@/observability/logger.js';

import type { UsageRecord, UsageRepository } from './types.js';

export interface UsageTracker {
  /** Associate `credential` with `context`. Safe to repeat. */
  track(context: CredentialsContext, credential: Credential): Promise<UsageRecord>;

  /** Track several credentials at once; duplicates within the call are tracked once. */
  trackAll(context: CredentialsContext, credentials: readonly Credential[]): Promise<UsageRecord[]>;

  /** Every context that has used `credential`. */
  usagesOf(credential: Credential): Promise<UsageRecord[]>;
}

interface UsageTrackerDeps {
  usageRepository: UsageRepository;
  logger: Logger;
  /** Injectable clock for tests. */
  now?: () => Date;
}

/** Stable fingerprint of a credential: its identity plus its secret reference. */
export function fingerprintOf(credential: Credential): string {
  const secret =
    credential.secret.kind === 'sealed'
      ? credential.secret.payload.encryptedValue
      : `${credential.secret.source}/${credential.secret.key}`;
  return createHash('sha256')
    .update(`${credential.type}\u0000${credential.id}\u0000${secret}`)
    .digest('hex');
}

/** Create a usage tracker over the given repository. */
export function createUsageTracker(deps: UsageTrackerDeps): UsageTracker {
  const { usageRepository, logger } = deps;
  const now = deps.now ?? (() => new Date());

  const tracker: UsageTracker = {
    async track(context: CredentialsContext, credential: Credential): Promise<UsageRecord> {
      const fingerprint = fingerprintOf(credential);
      const at = now();
      const existing = await usageRepository.find(fingerprint, context.id);

      if (existing) {
        return usageRepository.save({ ...existing, lastUsedAt: at });
      }

      logger.debug('Recording first credential use in context', {
        component: 'usage-tracker',
        credentialId: credential.id,
        contextId: context.id,
      });
      return usageRepository.save({
        fingerprint,
        credentialId: credential.id,
        contextId: context.id,
        contextKind: context.kind,
        firstUsedAt: at,
        lastUsedAt: at,
      });
    },

    async trackAll(
      context: CredentialsContext,
      credentials: readonly Credential[],
    ): Promise<UsageRecord[]> {
      const seen = new Set<string>();
      const records: UsageRecord[] = [];
      for (const credential of credentials) {
        const fingerprint = fingerprintOf(credential);
        if (seen.has(fingerprint)) continue;
        seen.add(fingerprint);
        records.push(await tracker.track(context, credential));
      }
      return records;
    },

    async usagesOf(credential: Credential): Promise<UsageRecord[]> {
      return usageRepository.listByFingerprint(fingerprintOf(credential));
    },
  };

  return tracker;
}
