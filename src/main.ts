import 'dotenv/config';
import { join } from 'node:path';
import { createLogger } from '@/observability/logger.js';
import { createDiagnostics } from '@/observability/diagnostics.js';
import type { Diagnostics } from '@/observability/diagnostics.js';
import type { Logger } from '@/observability/logger.js';
import { loadCredentialsConfig, loadSettings } from '@/config/loader.js';
import { createRootContext } from '@/contexts/context.js';
import { createAesSecretVault, parseMasterKey } from '@/secrets/crypto.js';
import { SYSTEM_ONLY_POLICY } from '@/security/access-policy.js';
import { createJsonFilePersistence } from '@/stores/persistence.js';
import type { StorePersistence } from '@/stores/types.js';
import { createProviderRegistry } from '@/providers/registry.js';
import { createSystemProvider } from '@/providers/system-provider.js';
import { createContextProvider } from '@/providers/context-provider.js';
import { createUserProvider } from '@/providers/user-provider.js';
import { createInMemoryUsageRepository } from '@/tracking/memory-usage-repository.js';
import { createCredentialsService } from '@/service/credentials-service.js';

const logger = createLogger();

/** One JSON file per store under `dataDir`. */
function filePersistence(
  dataDir: string,
  diagnostics: Diagnostics,
  log: Logger,
): (storeId: string) => StorePersistence {
  return (storeId) =>
    createJsonFilePersistence({
      filePath: join(dataDir, `${encodeURIComponent(storeId)}.json`),
      storeId,
      logger: log,
      diagnostics,
    });
}

async function start(): Promise<void> {
  const settings = loadSettings();
  if (!settings.ok) {
    logger.fatal('Invalid settings', { component: 'main', ...settings.error.context });
    process.exit(1);
  }
  const {
    CREDENTIALS_DATA_DIR: dataDir,
    CREDENTIALS_CONFIG_PATH: configPath,
    CREDENTIALS_PROVIDER_TIMEOUT_MS: timeoutMs,
  } = settings.value;

  const masterKey = parseMasterKey(settings.value.SECRETS_ENCRYPTION_KEY);
  if (!masterKey.ok) {
    logger.fatal(masterKey.error.message, { component: 'main' });
    process.exit(1);
  }

  try {
    const diagnostics = createDiagnostics();
    const root = createRootContext();
    // Only the system principal holds permissions until grants are configured.
    const policy = SYSTEM_ONLY_POLICY;
    const persistenceFor = filePersistence(dataDir, diagnostics, logger);

    const registry = createProviderRegistry({ logger, diagnostics, timeoutMs });
    registry.register(createSystemProvider({ root, policy, persistenceFor, logger }));
    registry.register(createContextProvider({ policy, persistenceFor, logger }));
    registry.register(createUserProvider({ policy, persistenceFor, logger }));

    const service = createCredentialsService({
      registry,
      policy,
      vault: createAesSecretVault(masterKey.value),
      usageRepository: createInMemoryUsageRepository(),
      diagnostics,
      logger,
      secretTimeoutMs: timeoutMs,
    });

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await service.shutdown();
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await service.initialize();

    if (configPath !== undefined) {
      const config = await loadCredentialsConfig(configPath);
      if (!config.ok) {
        logger.fatal(config.error.message, { component: 'main', ...config.error.context });
        process.exit(1);
      }
      const applied = await service.applyConfiguration(config.value);
      if (!applied.ok) {
        logger.fatal(applied.error.message, { component: 'main', ...applied.error.context });
        process.exit(1);
      }
      logger.info('Credentials configuration applied', {
        component: 'main',
        configPath,
        nodes: applied.value,
      });
    }

    const scopes = await service.lookupScopes(root);
    logger.info('Credentials ready', {
      component: 'main',
      dataDir,
      scopes,
      diagnostics: service.diagnostics().length,
    });

    await service.shutdown();
  } catch (err: unknown) {
    logger.fatal('Failed to start credentials service', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
