import { Inject, Injectable } from "@nestjs/common";

import type { LedgerRepository, LedgerTransaction } from "../repository/ledger.repository.js";
import { LEDGER_REPOSITORY } from "../tokens.js";
import type { AssetId, BlockHeight, HistoryEntry, Principal, ProvenanceRecord } from "../types.js";

export interface TransferDetails {
  newOwner: Principal;
  price: number;
  verificationHash: string;
  blockHeight: BlockHeight;
}

@Injectable()
export class HistoryLogService {
  constructor(@Inject(LEDGER_REPOSITORY) private readonly repository: LedgerRepository) {}

  /**
   * Appends the entry for a transfer of `record`, keyed at the record's transfer
   * count before the transfer. The caller must bump the count in the same
   * transaction.
   */
  async append(tx: LedgerTransaction, record: ProvenanceRecord, details: TransferDetails): Promise<HistoryEntry> {
    const entry: HistoryEntry = {
      assetId: record.assetId,
      transferIndex: record.transferCount,
      fromOwner: record.currentOwner,
      toOwner: details.newOwner,
      timestamp: details.blockHeight,
      price: details.price,
      verificationHash: details.verificationHash,
    };
    await tx.appendHistory(entry);
    return entry;
  }

  async getEntry(assetId: AssetId, transferIndex: number): Promise<HistoryEntry | undefined> {
    return this.repository.findHistoryEntry(assetId, transferIndex);
  }

  async list(assetId: AssetId): Promise<HistoryEntry[]> {
    return this.repository.listHistory(assetId);
  }
}
