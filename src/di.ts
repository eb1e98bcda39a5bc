import type { Logger } from "pino";
import { AppConfig, config as defaultConfig } from "./config";
import { createLogger } from "./common/logger";
import { AccountLedger } from "./modules/accounts/ledger";
import { AccountsRepository } from "./modules/accounts/repository";
import { CheckpointStore } from "./modules/checkpoints/repository";
import { SkipKind, TransactionProcessor } from "./modules/processing/service";
import { MemoryAccountsRepository } from "./infra/memory/memoryAccountsRepo";
import { FileCheckpointStore } from "./infra/file/fileCheckpointStore";

export type ContainerOptions = {
  config?: AppConfig;
  logger?: Logger;
  accountsRepo?: AccountsRepository;
  checkpoints?: CheckpointStore;
  onSkip?: (kind: SkipKind, lineNumber: number) => void;
};

export function createContainer(options: ContainerOptions = {}) {
  const config = options.config ?? defaultConfig;
  const logger = options.logger ?? createLogger(config.LOG_LEVEL);
  const accountsRepo = options.accountsRepo ?? new MemoryAccountsRepository();
  const checkpoints = options.checkpoints ?? new FileCheckpointStore(config.CHECKPOINT_PATH);
  const ledger = new AccountLedger(accountsRepo, config.POINTS_PER_DOLLAR);
  const processor = new TransactionProcessor(ledger, checkpoints, {
    targetMerchantId: config.TARGET_MERCHANT_ID,
    checkpointInterval: config.CHECKPOINT_INTERVAL,
    logger,
    onSkip: options.onSkip
  });

  return {
    config,
    logger,
    accountsRepo,
    checkpoints,
    ledger,
    processor
  };
}

