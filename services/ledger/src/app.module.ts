import { Module } from "@nestjs/common";
import { APP_FILTER } from "@nestjs/core";

import { BlockHeightClock } from "./clock.js";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { AssetsController } from "./controllers/assets.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { ModelsController } from "./controllers/models.controller.js";
import { StatsController } from "./controllers/stats.controller.js";
import { VerifiersController } from "./controllers/verifiers.controller.js";
import { LedgerExceptionFilter } from "./filters/ledger-exception.filter.js";
import { InMemoryLedgerRepository } from "./repository/memory.repository.js";
import { PostgresLedgerRepository } from "./repository/postgres.repository.js";
import { HistoryLogService } from "./services/history-log.service.js";
import { ModelRegistryService } from "./services/model-registry.service.js";
import { ProvenanceStoreService } from "./services/provenance-store.service.js";
import { TransferProtocolService } from "./services/transfer-protocol.service.js";
import { VerifierAuthorizationService } from "./services/verifier-authorization.service.js";
import { APP_CONFIG, LEDGER_CLOCK, LEDGER_REPOSITORY } from "./tokens.js";

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const clockProvider = {
  provide: LEDGER_CLOCK,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => new BlockHeightClock(config.clock),
};

const repositoryProvider = {
  provide: LEDGER_REPOSITORY,
  inject: [APP_CONFIG],
  useFactory: async (config: AppConfig) => {
    if (config.database.url) {
      const repo = new PostgresLedgerRepository(config.database.url);
      await repo.init();
      return repo;
    }
    return new InMemoryLedgerRepository();
  },
};

@Module({
  imports: [],
  controllers: [ModelsController, VerifiersController, AssetsController, StatsController, HealthController],
  providers: [
    configProvider,
    clockProvider,
    repositoryProvider,
    { provide: APP_FILTER, useClass: LedgerExceptionFilter },
    ModelRegistryService,
    VerifierAuthorizationService,
    ProvenanceStoreService,
    HistoryLogService,
    TransferProtocolService,
  ],
})
export class AppModule {}
