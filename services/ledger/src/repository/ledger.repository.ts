import type {
  AIModel,
  AssetId,
  CounterName,
  Counters,
  HistoryEntry,
  Principal,
  ProvenanceRecord,
  VerifierGrant,
} from "../types.js";

export interface LedgerReader {
  findModel(modelId: string): Promise<AIModel | undefined>;
  findVerifier(principal: Principal): Promise<VerifierGrant | undefined>;
  findAsset(assetId: AssetId): Promise<ProvenanceRecord | undefined>;
  findHistoryEntry(assetId: AssetId, transferIndex: number): Promise<HistoryEntry | undefined>;
  listHistory(assetId: AssetId): Promise<HistoryEntry[]>;
  counters(): Promise<Counters>;
}

/**
 * Handle passed to a unit of work. Writes are staged and become visible to other
 * callers only once the work resolves; a rejected unit of work leaves no trace.
 */
export interface LedgerTransaction extends LedgerReader {
  insertModel(model: AIModel): Promise<void>;
  putVerifier(grant: VerifierGrant): Promise<void>;
  insertAsset(record: ProvenanceRecord): Promise<void>;
  /** Compare-and-swap on `transferCount`; throws `StaleRecordError` on mismatch. */
  updateAsset(record: ProvenanceRecord, expectedTransferCount: number): Promise<void>;
  /** Throws when the `(assetId, transferIndex)` key is already taken. */
  appendHistory(entry: HistoryEntry): Promise<void>;
  incrementCounter(name: CounterName): Promise<void>;
}

export interface LedgerRepository extends LedgerReader {
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
}

export class HistoryConflictError extends Error {
  constructor(readonly assetId: AssetId, readonly transferIndex: number) {
    super(`history entry ${transferIndex} for asset ${assetId} already exists`);
    this.name = "HistoryConflictError";
  }
}
