import { Injectable } from "@nestjs/common";

import { LedgerError, StaleRecordError } from "../errors.js";
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
import { HistoryConflictError } from "./ledger.repository.js";
import type { LedgerReader, LedgerRepository, LedgerTransaction } from "./ledger.repository.js";

interface LedgerState {
  models: Map<string, AIModel>;
  verifiers: Map<Principal, VerifierGrant>;
  assets: Map<AssetId, ProvenanceRecord>;
  history: Map<string, HistoryEntry>;
  counters: Counters;
}

function historyKey(assetId: AssetId, transferIndex: number): string {
  return `${assetId}:${transferIndex}`;
}

function readHistory(
  lookup: (key: string) => HistoryEntry | undefined,
  assetId: AssetId,
  count: number,
): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (let index = 0; index < count; index += 1) {
    const entry = lookup(historyKey(assetId, index));
    if (entry) {
      entries.push({ ...entry });
    }
  }
  return entries;
}

class StateReader implements LedgerReader {
  constructor(protected readonly state: LedgerState) {}

  async findModel(modelId: string): Promise<AIModel | undefined> {
    const model = this.state.models.get(modelId);
    return model ? { ...model } : undefined;
  }

  async findVerifier(principal: Principal): Promise<VerifierGrant | undefined> {
    const grant = this.state.verifiers.get(principal);
    return grant ? { ...grant } : undefined;
  }

  async findAsset(assetId: AssetId): Promise<ProvenanceRecord | undefined> {
    const record = this.state.assets.get(assetId);
    return record ? { ...record } : undefined;
  }

  async findHistoryEntry(assetId: AssetId, transferIndex: number): Promise<HistoryEntry | undefined> {
    const entry = this.state.history.get(historyKey(assetId, transferIndex));
    return entry ? { ...entry } : undefined;
  }

  async listHistory(assetId: AssetId): Promise<HistoryEntry[]> {
    const record = this.state.assets.get(assetId);
    if (!record) {
      return [];
    }
    return readHistory((key) => this.state.history.get(key), assetId, record.transferCount);
  }

  async counters(): Promise<Counters> {
    return { ...this.state.counters };
  }
}

/**
 * Staged unit of work. Reads fall through to committed state unless the same key
 * was written earlier in this transaction.
 */
class MemoryLedgerTransaction implements LedgerTransaction {
  private readonly models = new Map<string, AIModel>();
  private readonly verifiers = new Map<Principal, VerifierGrant>();
  private readonly assets = new Map<AssetId, ProvenanceRecord>();
  private readonly history = new Map<string, HistoryEntry>();
  private readonly counterDeltas: Counters = { totalAssets: 0, totalModels: 0 };
  private closed = false;

  constructor(private readonly state: LedgerState) {}

  async findModel(modelId: string): Promise<AIModel | undefined> {
    const model = this.models.get(modelId) ?? this.state.models.get(modelId);
    return model ? { ...model } : undefined;
  }

  async findVerifier(principal: Principal): Promise<VerifierGrant | undefined> {
    const grant = this.verifiers.get(principal) ?? this.state.verifiers.get(principal);
    return grant ? { ...grant } : undefined;
  }

  async findAsset(assetId: AssetId): Promise<ProvenanceRecord | undefined> {
    const record = this.assets.get(assetId) ?? this.state.assets.get(assetId);
    return record ? { ...record } : undefined;
  }

  async findHistoryEntry(assetId: AssetId, transferIndex: number): Promise<HistoryEntry | undefined> {
    const key = historyKey(assetId, transferIndex);
    const entry = this.history.get(key) ?? this.state.history.get(key);
    return entry ? { ...entry } : undefined;
  }

  async listHistory(assetId: AssetId): Promise<HistoryEntry[]> {
    const record = await this.findAsset(assetId);
    if (!record) {
      return [];
    }
    return readHistory(
      (key) => this.history.get(key) ?? this.state.history.get(key),
      assetId,
      record.transferCount,
    );
  }

  async counters(): Promise<Counters> {
    return {
      totalAssets: this.state.counters.totalAssets + this.counterDeltas.totalAssets,
      totalModels: this.state.counters.totalModels + this.counterDeltas.totalModels,
    };
  }

  async insertModel(model: AIModel): Promise<void> {
    this.ensureOpen();
    if (await this.findModel(model.modelId)) {
      throw new LedgerError("AlreadyRegistered", `model ${model.modelId} is already registered`);
    }
    this.models.set(model.modelId, { ...model });
  }

  async putVerifier(grant: VerifierGrant): Promise<void> {
    this.ensureOpen();
    this.verifiers.set(grant.principal, { ...grant });
  }

  async insertAsset(record: ProvenanceRecord): Promise<void> {
    this.ensureOpen();
    if (await this.findAsset(record.assetId)) {
      throw new LedgerError("AlreadyRegistered", `asset ${record.assetId} is already registered`);
    }
    this.assets.set(record.assetId, { ...record });
  }

  async updateAsset(record: ProvenanceRecord, expectedTransferCount: number): Promise<void> {
    this.ensureOpen();
    const current = await this.findAsset(record.assetId);
    if (!current || current.transferCount !== expectedTransferCount) {
      throw new StaleRecordError(record.assetId, expectedTransferCount);
    }
    this.assets.set(record.assetId, { ...record });
  }

  async appendHistory(entry: HistoryEntry): Promise<void> {
    this.ensureOpen();
    const key = historyKey(entry.assetId, entry.transferIndex);
    if (this.history.has(key) || this.state.history.has(key)) {
      throw new HistoryConflictError(entry.assetId, entry.transferIndex);
    }
    this.history.set(key, { ...entry });
  }

  async incrementCounter(name: CounterName): Promise<void> {
    this.ensureOpen();
    this.counterDeltas[name] += 1;
  }

  commit(): void {
    this.ensureOpen();
    this.closed = true;
    for (const [id, model] of this.models) {
      this.state.models.set(id, model);
    }
    for (const [principal, grant] of this.verifiers) {
      this.state.verifiers.set(principal, grant);
    }
    for (const [id, record] of this.assets) {
      this.state.assets.set(id, record);
    }
    for (const [key, entry] of this.history) {
      this.state.history.set(key, entry);
    }
    this.state.counters.totalAssets += this.counterDeltas.totalAssets;
    this.state.counters.totalModels += this.counterDeltas.totalModels;
  }

  discard(): void {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error("transaction is no longer active");
    }
  }
}

@Injectable()
export class InMemoryLedgerRepository extends StateReader implements LedgerRepository {
  private tail: Promise<void> = Promise.resolve();

  constructor() {
    super({
      models: new Map(),
      verifiers: new Map(),
      assets: new Map(),
      history: new Map(),
      counters: { totalAssets: 0, totalModels: 0 },
    });
  }

  /** Units of work run one at a time, in submission order. */
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.execute(work));
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Writes a record directly, bypassing operation gates. Intended for fixtures. */
  seedAsset(record: ProvenanceRecord): void {
    this.state.assets.set(record.assetId, { ...record });
  }

  private async execute<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const tx = new MemoryLedgerTransaction(this.state);
    try {
      const result = await work(tx);
      tx.commit();
      return result;
    } catch (error) {
      tx.discard();
      throw error;
    }
  }
}
