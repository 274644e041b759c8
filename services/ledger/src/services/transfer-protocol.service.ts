import { Inject, Injectable, Logger } from "@nestjs/common";

import type { LedgerClock } from "../clock.js";
import { isLedgerError, LedgerError } from "../errors.js";
import type { LedgerErrorCode } from "../errors.js";
import type { LedgerReader, LedgerRepository } from "../repository/ledger.repository.js";
import { MIN_CONFIDENCE, passesFraudThreshold, recalculateScore } from "../scoring.js";
import { LEDGER_CLOCK, LEDGER_REPOSITORY } from "../tokens.js";
import type { AssetId, Principal, ProvenanceRecord, TransferInput, TransferReceipt } from "../types.js";
import { HistoryLogService } from "./history-log.service.js";

interface ClearedTransfer {
  record: ProvenanceRecord;
  updatedScore: number;
}

export type TransferPreview =
  | { assetId: AssetId; eligible: true; updatedScore: number }
  | { assetId: AssetId; eligible: false; failure: LedgerErrorCode; message: string };

@Injectable()
export class TransferProtocolService {
  private readonly logger = new Logger(TransferProtocolService.name);

  constructor(
    @Inject(LEDGER_REPOSITORY) private readonly repository: LedgerRepository,
    @Inject(LEDGER_CLOCK) private readonly clock: LedgerClock,
    @Inject(HistoryLogService) private readonly history: HistoryLogService,
  ) {}

  async transferAsset(caller: Principal, input: TransferInput): Promise<TransferReceipt> {
    const receipt = await this.repository.transaction(async (tx) => {
      const { record, updatedScore } = await this.clear(tx, caller, input.assetId);
      const blockHeight = this.clock.blockHeight();

      const entry = await this.history.append(tx, record, {
        newOwner: input.newOwner,
        price: input.price,
        verificationHash: input.verificationHash,
        blockHeight,
      });
      const updated: ProvenanceRecord = {
        ...record,
        currentOwner: input.newOwner,
        transferCount: record.transferCount + 1,
        authenticityScore: updatedScore,
        lastVerified: blockHeight,
      };
      await tx.updateAsset(updated, record.transferCount);
      return { record: updated, entry };
    });
    this.logger.log(
      `Transferred asset ${input.assetId} from ${receipt.entry.fromOwner} to ${receipt.entry.toOwner} ` +
        `(index ${receipt.entry.transferIndex}, score ${receipt.record.authenticityScore})`,
    );
    return receipt;
  }

  /** Runs every transfer gate for `caller` without writing anything. */
  async previewTransfer(caller: Principal, assetId: AssetId): Promise<TransferPreview> {
    try {
      const { updatedScore } = await this.clear(this.repository, caller, assetId);
      return { assetId, eligible: true, updatedScore };
    } catch (error) {
      if (isLedgerError(error)) {
        return { assetId, eligible: false, failure: error.code, message: error.message };
      }
      throw error;
    }
  }

  private async clear(reader: LedgerReader, caller: Principal, assetId: AssetId): Promise<ClearedTransfer> {
    const record = await reader.findAsset(assetId);
    if (!record) {
      throw new LedgerError("NftNotFound", `asset ${assetId} does not exist`);
    }
    if (record.currentOwner !== caller) {
      throw new LedgerError("NotAuthorized", `${caller} does not own asset ${assetId}`);
    }
    if (record.flagged) {
      throw new LedgerError("TransferFailed", `asset ${assetId} is flagged for suspected fraud`);
    }

    const model = await reader.findModel(record.aiModelId);
    if (!model) {
      throw new LedgerError("InvalidAiModel", `model ${record.aiModelId} is no longer registered`);
    }

    const updatedScore = recalculateScore(model.confidenceLevel, record.authenticityScore);
    if (!passesFraudThreshold(updatedScore)) {
      throw new LedgerError(
        "TransferFailed",
        `recalculated authenticity ${updatedScore} is below the minimum of ${MIN_CONFIDENCE}`,
      );
    }
    return { record, updatedScore };
  }
}
