import { ManualClock } from "../src/clock.js";
import type { AppConfig } from "../src/config.js";
import { InMemoryLedgerRepository } from "../src/repository/memory.repository.js";
import { HistoryLogService } from "../src/services/history-log.service.js";
import { ModelRegistryService } from "../src/services/model-registry.service.js";
import { ProvenanceStoreService } from "../src/services/provenance-store.service.js";
import { TransferProtocolService } from "../src/services/transfer-protocol.service.js";
import { VerifierAuthorizationService } from "../src/services/verifier-authorization.service.js";

export const OWNER = "registry-owner";
export const GENESIS_BLOCK = 100;

export function testConfig(): AppConfig {
  return {
    port: 0,
    registryOwner: OWNER,
    database: {},
    clock: { genesisTime: 0, blockIntervalMs: 1000 },
  };
}

export function buildLedger() {
  const config = testConfig();
  const repository = new InMemoryLedgerRepository();
  const clock = new ManualClock(GENESIS_BLOCK);
  const models = new ModelRegistryService(config, repository);
  const verifiers = new VerifierAuthorizationService(config, repository);
  const store = new ProvenanceStoreService(repository, clock, models, verifiers);
  const history = new HistoryLogService(repository);
  const transfers = new TransferProtocolService(repository, clock, history);
  return { config, repository, clock, models, verifiers, store, history, transfers };
}

export type Ledger = ReturnType<typeof buildLedger>;
