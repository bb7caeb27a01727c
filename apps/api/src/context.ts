import path from "node:path";
import type { AppConfig } from "./config/app-config.js";
import type { Env } from "./config/env.js";
import type { Logger } from "./core/logger.js";
import { ArchiveService } from "./modules/archive/archive-service.js";
import { BackupService } from "./modules/backup/backup-service.js";
import { FileStateRepository } from "./modules/backup/repository/file-state-repository.js";
import { RestoreService } from "./modules/backup/restore-service.js";
import { RetentionService } from "./modules/backup/retention-service.js";
import { EncryptionService } from "./modules/crypto/encryption-service.js";
import { EnvPasswordProvider, type PasswordProvider } from "./modules/crypto/password-provider.js";
import { ShareService } from "./modules/sharing/share-service.js";
import { StorageRegistry } from "./modules/storage/storage-registry.js";
import type { ChangeSource } from "./modules/watch/change-source.js";
import { WatchOrchestrator } from "./modules/watch/watch-orchestrator.js";

export type EngineContext = {
  env: Env;
  config: AppConfig;
  logger: Logger;
  state: FileStateRepository;
  registry: StorageRegistry;
  passwords: PasswordProvider;
  backup: BackupService;
  restore: RestoreService;
  retention: RetentionService;
  shares: ShareService;
  watch: WatchOrchestrator;
};

export type EngineContextOptions = {
  env: Env;
  config: AppConfig;
  logger: Logger;
  passwords?: PasswordProvider;
  registry?: StorageRegistry;
  changeSource?: ChangeSource;
  tempRoot?: string;
};

/** Wires every engine explicitly; nothing here is process-global. Loads state. */
export async function createEngineContext(options: EngineContextOptions): Promise<EngineContext> {
  const { env, config, logger } = options;
  const state = new FileStateRepository(
    path.resolve(env.BACKHAUL_STATE_FILE),
    logger.child({ module: "state" }),
    config.state.historyLimit
  );
  await state.load();

  const registry = options.registry ?? new StorageRegistry(logger.child({ module: "storage" }), config.storage);
  const passwords = options.passwords ?? new EnvPasswordProvider(env.BACKHAUL_PASSWORD_ENV);
  const archive = new ArchiveService(logger.child({ module: "archive" }));
  const encryption = new EncryptionService(config.encryption.iterations);
  const retention = new RetentionService(config.retention, registry, state, logger.child({ module: "retention" }));

  const backup = new BackupService({
    config,
    registry,
    state,
    archive,
    encryption,
    passwords,
    retention,
    logger: logger.child({ module: "backup" }),
    tempRoot: options.tempRoot
  });
  const restore = new RestoreService({
    config,
    registry,
    state,
    archive,
    encryption,
    passwords,
    logger: logger.child({ module: "restore" }),
    tempRoot: options.tempRoot
  });
  const shares = new ShareService(registry, logger.child({ module: "sharing" }));
  const watch = new WatchOrchestrator({
    config,
    backup,
    state,
    logger: logger.child({ module: "watch" }),
    source: options.changeSource
  });

  return { env, config, logger, state, registry, passwords, backup, restore, retention, shares, watch };
}
