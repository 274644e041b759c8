import { Injectable, Logger } from "@nestjs/common";
import type { OnModuleDestroy } from "@nestjs/common";
import pg from "pg";
import { z } from "zod";

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

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(error?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
  end(): Promise<void>;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ledger_models (
    model_id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    version TEXT NOT NULL,
    registered_by TEXT NOT NULL,
    confidence_level INTEGER NOT NULL CHECK (confidence_level BETWEEN 0 AND 100),
    is_active BOOLEAN NOT NULL
  );
  CREATE TABLE IF NOT EXISTS ledger_verifiers (
    principal TEXT PRIMARY KEY,
    is_authorized BOOLEAN NOT NULL
  );
  CREATE TABLE IF NOT EXISTS ledger_assets (
    asset_id BIGINT PRIMARY KEY,
    current_owner TEXT NOT NULL,
    creator TEXT NOT NULL,
    ai_model_id TEXT NOT NULL,
    authenticity_score INTEGER NOT NULL CHECK (authenticity_score BETWEEN 0 AND 100),
    creation_timestamp BIGINT NOT NULL,
    last_verified BIGINT NOT NULL,
    transfer_count INTEGER NOT NULL CHECK (transfer_count >= 0),
    flagged BOOLEAN NOT NULL DEFAULT FALSE
  );
  CREATE TABLE IF NOT EXISTS ledger_history (
    asset_id BIGINT NOT NULL REFERENCES ledger_assets (asset_id),
    transfer_index INTEGER NOT NULL,
    from_owner TEXT NOT NULL,
    to_owner TEXT NOT NULL,
    block_height BIGINT NOT NULL,
    price BIGINT NOT NULL CHECK (price >= 0),
    verification_hash TEXT NOT NULL,
    PRIMARY KEY (asset_id, transfer_index)
  );
  CREATE TABLE IF NOT EXISTS ledger_counters (
    name TEXT PRIMARY KEY,
    value BIGINT NOT NULL DEFAULT 0
  );
  INSERT INTO ledger_counters (name, value)
  VALUES ('totalAssets', 0), ('totalModels', 0)
  ON CONFLICT (name) DO NOTHING
`;

// BIGINT columns come back from pg as strings.
const int = z.coerce.number().int();

const modelRow = z.object({
  model_id: z.string(),
  name: z.string(),
  version: z.string(),
  registered_by: z.string(),
  confidence_level: int,
  is_active: z.boolean(),
});

const verifierRow = z.object({
  principal: z.string(),
  is_authorized: z.boolean(),
});

const assetRow = z.object({
  asset_id: int,
  current_owner: z.string(),
  creator: z.string(),
  ai_model_id: z.string(),
  authenticity_score: int,
  creation_timestamp: int,
  last_verified: int,
  transfer_count: int,
  flagged: z.boolean(),
});

const historyRow = z.object({
  asset_id: int,
  transfer_index: int,
  from_owner: z.string(),
  to_owner: z.string(),
  block_height: int,
  price: int,
  verification_hash: z.string(),
});

const counterRow = z.object({
  name: z.enum(["totalAssets", "totalModels"]),
  value: int,
});

function toModel(row: unknown): AIModel {
  const parsed = modelRow.parse(row);
  return {
    modelId: parsed.model_id,
    name: parsed.name,
    version: parsed.version,
    registeredBy: parsed.registered_by,
    confidenceLevel: parsed.confidence_level,
    isActive: parsed.is_active,
  };
}

function toAsset(row: unknown): ProvenanceRecord {
  const parsed = assetRow.parse(row);
  return {
    assetId: parsed.asset_id,
    currentOwner: parsed.current_owner,
    creator: parsed.creator,
    aiModelId: parsed.ai_model_id,
    authenticityScore: parsed.authenticity_score,
    creationTimestamp: parsed.creation_timestamp,
    lastVerified: parsed.last_verified,
    transferCount: parsed.transfer_count,
    flagged: parsed.flagged,
  };
}

function toHistoryEntry(row: unknown): HistoryEntry {
  const parsed = historyRow.parse(row);
  return {
    assetId: parsed.asset_id,
    transferIndex: parsed.transfer_index,
    fromOwner: parsed.from_owner,
    toOwner: parsed.to_owner,
    timestamp: parsed.block_height,
    price: parsed.price,
    verificationHash: parsed.verification_hash,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}

class PostgresReader implements LedgerReader {
  constructor(
    protected readonly client: SqlClient,
    private readonly lockAssets: boolean,
  ) {}

  async findModel(modelId: string): Promise<AIModel | undefined> {
    const result = await this.client.query(
      `SELECT model_id, name, version, registered_by, confidence_level, is_active
       FROM ledger_models
       WHERE model_id = $1`,
      [modelId],
    );
    return result.rows.length === 0 ? undefined : toModel(result.rows[0]);
  }

  async findVerifier(principal: Principal): Promise<VerifierGrant | undefined> {
    const result = await this.client.query(
      "SELECT principal, is_authorized FROM ledger_verifiers WHERE principal = $1",
      [principal],
    );
    if (result.rows.length === 0) {
      return undefined;
    }
    const row = verifierRow.parse(result.rows[0]);
    return { principal: row.principal, isAuthorized: row.is_authorized };
  }

  async findAsset(assetId: AssetId): Promise<ProvenanceRecord | undefined> {
    const result = await this.client.query(
      `SELECT asset_id, current_owner, creator, ai_model_id, authenticity_score,
              creation_timestamp, last_verified, transfer_count, flagged
       FROM ledger_assets
       WHERE asset_id = $1${this.lockAssets ? " FOR UPDATE" : ""}`,
      [assetId],
    );
    return result.rows.length === 0 ? undefined : toAsset(result.rows[0]);
  }

  async findHistoryEntry(assetId: AssetId, transferIndex: number): Promise<HistoryEntry | undefined> {
    const result = await this.client.query(
      `SELECT asset_id, transfer_index, from_owner, to_owner, block_height, price, verification_hash
       FROM ledger_history
       WHERE asset_id = $1 AND transfer_index = $2`,
      [assetId, transferIndex],
    );
    return result.rows.length === 0 ? undefined : toHistoryEntry(result.rows[0]);
  }

  async listHistory(assetId: AssetId): Promise<HistoryEntry[]> {
    const result = await this.client.query(
      `SELECT asset_id, transfer_index, from_owner, to_owner, block_height, price, verification_hash
       FROM ledger_history
       WHERE asset_id = $1
       ORDER BY transfer_index ASC`,
      [assetId],
    );
    return result.rows.map(toHistoryEntry);
  }

  async counters(): Promise<Counters> {
    const result = await this.client.query("SELECT name, value FROM ledger_counters");
    const counters: Counters = { totalAssets: 0, totalModels: 0 };
    for (const row of result.rows) {
      const parsed = counterRow.parse(row);
      counters[parsed.name] = parsed.value;
    }
    return counters;
  }
}

class PostgresLedgerTransaction extends PostgresReader implements LedgerTransaction {
  constructor(client: SqlClient) {
    super(client, true);
  }

  async insertModel(model: AIModel): Promise<void> {
    try {
      await this.client.query(
        `INSERT INTO ledger_models (model_id, name, version, registered_by, confidence_level, is_active)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [model.modelId, model.name, model.version, model.registeredBy, model.confidenceLevel, model.isActive],
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new LedgerError("AlreadyRegistered", `model ${model.modelId} is already registered`);
      }
      throw error;
    }
  }

  async putVerifier(grant: VerifierGrant): Promise<void> {
    await this.client.query(
      `INSERT INTO ledger_verifiers (principal, is_authorized)
       VALUES ($1, $2)
       ON CONFLICT (principal) DO UPDATE SET is_authorized = EXCLUDED.is_authorized`,
      [grant.principal, grant.isAuthorized],
    );
  }

  async insertAsset(record: ProvenanceRecord): Promise<void> {
    try {
      await this.client.query(
        `INSERT INTO ledger_assets (asset_id, current_owner, creator, ai_model_id, authenticity_score,
                                    creation_timestamp, last_verified, transfer_count, flagged)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
        [
          record.assetId,
          record.currentOwner,
          record.creator,
          record.aiModelId,
          record.authenticityScore,
          record.creationTimestamp,
          record.lastVerified,
          record.transferCount,
          record.flagged,
        ],
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new LedgerError("AlreadyRegistered", `asset ${record.assetId} is already registered`);
      }
      throw error;
    }
  }

  async updateAsset(record: ProvenanceRecord, expectedTransferCount: number): Promise<void> {
    // creator, creation_timestamp and ai_model_id are write-once.
    const result = await this.client.query(
      `UPDATE ledger_assets
       SET current_owner = $2,
           authenticity_score = $3,
           last_verified = $4,
           transfer_count = $5,
           flagged = $6
       WHERE asset_id = $1 AND transfer_count = $7`,
      [
        record.assetId,
        record.currentOwner,
        record.authenticityScore,
        record.lastVerified,
        record.transferCount,
        record.flagged,
        expectedTransferCount,
      ],
    );
    if (result.rowCount !== 1) {
      throw new StaleRecordError(record.assetId, expectedTransferCount);
    }
  }

  async appendHistory(entry: HistoryEntry): Promise<void> {
    try {
      await this.client.query(
        `INSERT INTO ledger_history (asset_id, transfer_index, from_owner, to_owner, block_height, price, verification_hash)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          entry.assetId,
          entry.transferIndex,
          entry.fromOwner,
          entry.toOwner,
          entry.timestamp,
          entry.price,
          entry.verificationHash,
        ],
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new HistoryConflictError(entry.assetId, entry.transferIndex);
      }
      throw error;
    }
  }

  async incrementCounter(name: CounterName): Promise<void> {
    await this.client.query("UPDATE ledger_counters SET value = value + 1 WHERE name = $1", [name]);
  }
}

@Injectable()
export class PostgresLedgerRepository extends PostgresReader implements LedgerRepository, OnModuleDestroy {
  private readonly logger = new Logger(PostgresLedgerRepository.name);
  private initialized = false;

  constructor(
    databaseUrl: string,
    private readonly pool: SqlPool = new pg.Pool({ connectionString: databaseUrl }),
  ) {
    super(pool, false);
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.pool.query(SCHEMA);
    this.initialized = true;
    this.logger.log("Postgres ledger repository ready");
  }

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    if (!this.initialized) {
      await this.init();
    }
    const client = await this.pool.connect();
    let releaseError: Error | undefined;
    try {
      await client.query("BEGIN");
      const result = await work(new PostgresLedgerTransaction(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      releaseError = await this.rollback(client);
      throw error;
    } finally {
      client.release(releaseError);
    }
  }

  /** Returns the rollback failure, if any; the client must then be discarded. */
  private async rollback(client: SqlPoolClient): Promise<Error | undefined> {
    try {
      await client.query("ROLLBACK");
      return undefined;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`ROLLBACK failed, discarding connection: ${failure.message}`);
      return failure;
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }
}
