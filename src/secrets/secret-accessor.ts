/**
 * SecretAccessor — the single way to turn a credential into its plaintext.
 *
 * Each non-preview access writes exactly one usage record and says so in the
 * returned `tracked` flag, so the tracking obligation is visible to callers.
 */
import { CredentialUnavailableError, ProviderTimeoutError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { withTimeout } from '@/core/timeout.js';
import type { CredentialsContext } from '@/core/types.js';
import type { Credential } from '@/credentials/types.js';
import type { Logger } from '@/observability/logger.js';
import type { UsageTracker } from '@/tracking/usage-tracker.js';

import type {
  ExternalSecretSource,
  SecretAccess,
  SecretAccessOptions,
  SecretVault,
} from './types.js';

export interface SecretAccessor {
  access(
    credential: Credential,
    context: CredentialsContext,
    options?: SecretAccessOptions,
  ): Promise<Result<SecretAccess, CredentialUnavailableError>>;
}

interface SecretAccessorDeps {
  vault: SecretVault;
  usageTracker: UsageTracker;
  logger: Logger;
  externalSources?: readonly ExternalSecretSource[];
  /** Bound on each external fetch. Default: 5000ms. */
  timeoutMs?: number;
}

/** Create a SecretAccessor over the vault and external sources. */
export function createSecretAccessor(deps: SecretAccessorDeps): SecretAccessor {
  const { vault, usageTracker, logger } = deps;
  const timeoutMs = deps.timeoutMs ?? 5000;
  const sources = new Map(
    (deps.externalSources ?? []).map((s): [string, ExternalSecretSource] => [s.id, s]),
  );

  async function resolvePlaintext(
    credential: Credential,
    signal?: AbortSignal,
  ): Promise<Result<string, CredentialUnavailableError>> {
    const secret = credential.secret;

    if (secret.kind === 'sealed') {
      try {
        return ok(vault.decrypt(secret.payload));
      } catch (error) {
        return err(
          new CredentialUnavailableError(
            credential.id,
            'sealed secret could not be decrypted',
            error instanceof Error ? error : undefined,
          ),
        );
      }
    }

    const source = sources.get(secret.source);
    if (!source) {
      return err(
        new CredentialUnavailableError(credential.id, `unknown secret source "${secret.source}"`),
      );
    }

    try {
      const value = await withTimeout(
        `Secret source "${source.id}"`,
        timeoutMs,
        (abortSignal) => source.fetch(secret.key, abortSignal),
        signal,
      );
      if (value === null) {
        return err(
          new CredentialUnavailableError(credential.id, `secret source "${source.id}" has no such key`),
        );
      }
      return ok(value);
    } catch (error) {
      const reason =
        error instanceof ProviderTimeoutError ? 'secret source timed out' : 'secret source failed';
      return err(
        new CredentialUnavailableError(
          credential.id,
          reason,
          error instanceof Error ? error : undefined,
        ),
      );
    }
  }

  return {
    async access(
      credential: Credential,
      context: CredentialsContext,
      options?: SecretAccessOptions,
    ): Promise<Result<SecretAccess, CredentialUnavailableError>> {
      const plaintext = await resolvePlaintext(credential, options?.signal);
      if (!plaintext.ok) {
        logger.warn('Credential secret unavailable', {
          component: 'secret-accessor',
          credentialId: credential.id,
          contextId: context.id,
          reason: plaintext.error.message,
        });
        return plaintext;
      }

      if (options?.preview === true) {
        return ok({ value: plaintext.value, tracked: false });
      }

      await usageTracker.track(context, credential);
      return ok({ value: plaintext.value, tracked: true });
    },
  };
}
