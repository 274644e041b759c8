import { Inject, Injectable, Logger } from "@nestjs/common";

import type { LedgerClock } from "../clock.js";
import { LedgerError } from "../errors.js";
import type { LedgerRepository } from "../repository/ledger.repository.js";
import { isValidScore } from "../scoring.js";
import { LEDGER_CLOCK, LEDGER_REPOSITORY } from "../tokens.js";
import type { AssetId, Counters, Principal, ProvenanceRecord, RegisterAssetInput } from "../types.js";
import { ModelRegistryService } from "./model-registry.service.js";
import { VerifierAuthorizationService } from "./verifier-authorization.service.js";

@Injectable()
export class ProvenanceStoreService {
  private readonly logger = new Logger(ProvenanceStoreService.name);

  constructor(
    @Inject(LEDGER_REPOSITORY) private readonly repository: LedgerRepository,
    @Inject(LEDGER_CLOCK) private readonly clock: LedgerClock,
    @Inject(ModelRegistryService) private readonly models: ModelRegistryService,
    @Inject(VerifierAuthorizationService) private readonly verifiers: VerifierAuthorizationService,
  ) {}

  async registerAsset(caller: Principal, input: RegisterAssetInput): Promise<ProvenanceRecord> {
    const record = await this.repository.transaction(async (tx) => {
      if (await tx.findAsset(input.assetId)) {
        throw new LedgerError("AlreadyRegistered", `asset ${input.assetId} is already registered`);
      }
      if (!(await this.models.isActiveModel(input.modelId, tx))) {
        throw new LedgerError("InvalidAiModel", `model ${input.modelId} is not an active registered model`);
      }
      if (!isValidScore(input.initialScore)) {
        throw new LedgerError("InvalidAuthenticityScore", "authenticity score must be between 0 and 100");
      }

      const blockHeight = this.clock.blockHeight();
      const created: ProvenanceRecord = {
        assetId: input.assetId,
        currentOwner: caller,
        creator: caller,
        aiModelId: input.modelId,
        authenticityScore: input.initialScore,
        creationTimestamp: blockHeight,
        lastVerified: blockHeight,
        transferCount: 0,
        flagged: false,
      };
      await tx.insertAsset(created);
      await tx.incrementCounter("totalAssets");
      return created;
    });
    this.logger.log(`Registered asset ${record.assetId} for ${record.creator} at block ${record.creationTimestamp}`);
    return record;
  }

  /** Replaces score and last-verified height only; every other field is carried over. */
  async updateScore(caller: Principal, assetId: AssetId, newScore: number): Promise<ProvenanceRecord> {
    const record = await this.repository.transaction(async (tx) => {
      const current = await tx.findAsset(assetId);
      if (!current) {
        throw new LedgerError("NftNotFound", `asset ${assetId} does not exist`);
      }
      if (!(await this.verifiers.isAuthorizedVerifier(caller, tx))) {
        throw new LedgerError("NotAuthorized", `${caller} is not an authorized verifier`);
      }
      if (!isValidScore(newScore)) {
        throw new LedgerError("InvalidAuthenticityScore", "authenticity score must be between 0 and 100");
      }

      const updated: ProvenanceRecord = {
        ...current,
        authenticityScore: newScore,
        lastVerified: this.clock.blockHeight(),
      };
      await tx.updateAsset(updated, current.transferCount);
      return updated;
    });
    this.logger.log(`Verifier ${caller} set score of asset ${assetId} to ${newScore}`);
    return record;
  }

  async getAsset(assetId: AssetId): Promise<ProvenanceRecord | undefined> {
    return this.repository.findAsset(assetId);
  }

  async counters(): Promise<Counters> {
    return this.repository.counters();
  }
}
