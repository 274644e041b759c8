import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import { LedgerError } from "../errors.js";
import type { LedgerReader, LedgerRepository } from "../repository/ledger.repository.js";
import { isValidConfidence, MIN_CONFIDENCE } from "../scoring.js";
import { APP_CONFIG, LEDGER_REPOSITORY } from "../tokens.js";
import type { AIModel, Principal, RegisterModelInput } from "../types.js";

@Injectable()
export class ModelRegistryService {
  private readonly logger = new Logger(ModelRegistryService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(LEDGER_REPOSITORY) private readonly repository: LedgerRepository,
  ) {}

  async registerModel(caller: Principal, input: RegisterModelInput): Promise<AIModel> {
    const model = await this.repository.transaction(async (tx) => {
      if (caller !== this.config.registryOwner) {
        throw new LedgerError("NotAuthorized", "only the registry owner may register models");
      }
      if (await tx.findModel(input.modelId)) {
        throw new LedgerError("AlreadyRegistered", `model ${input.modelId} is already registered`);
      }
      if (!isValidConfidence(input.confidenceLevel)) {
        throw new LedgerError(
          "InvalidAuthenticityScore",
          `confidence level must be between ${MIN_CONFIDENCE} and 100`,
        );
      }

      const created: AIModel = {
        modelId: input.modelId,
        name: input.name,
        version: input.version,
        registeredBy: caller,
        confidenceLevel: input.confidenceLevel,
        isActive: true,
      };
      await tx.insertModel(created);
      await tx.incrementCounter("totalModels");
      return created;
    });
    this.logger.log(`Registered model ${model.modelId} (confidence ${model.confidenceLevel})`);
    return model;
  }

  async isActiveModel(modelId: string, reader: LedgerReader = this.repository): Promise<boolean> {
    const model = await reader.findModel(modelId);
    return model?.isActive === true;
  }

  async getModel(modelId: string): Promise<AIModel | undefined> {
    return this.repository.findModel(modelId);
  }
}
