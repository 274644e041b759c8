import { describe, expect, it } from "vitest";

import { StaleRecordError } from "../src/errors.js";
import { HistoryConflictError } from "../src/repository/ledger.repository.js";
import type { LedgerTransaction } from "../src/repository/ledger.repository.js";
import { InMemoryLedgerRepository } from "../src/repository/memory.repository.js";
import type { AIModel, HistoryEntry, ProvenanceRecord } from "../src/types.js";

const model: AIModel = {
  modelId: "M1",
  name: "Diffusion",
  version: "1",
  registeredBy: "owner",
  confidenceLevel: 80,
  isActive: true,
};

const record: ProvenanceRecord = {
  assetId: 1,
  currentOwner: "alice",
  creator: "alice",
  aiModelId: "M1",
  authenticityScore: 75,
  creationTimestamp: 1,
  lastVerified: 1,
  transferCount: 0,
  flagged: false,
};

const entry: HistoryEntry = {
  assetId: 1,
  transferIndex: 0,
  fromOwner: "alice",
  toOwner: "bob",
  timestamp: 2,
  price: 10,
  verificationHash: "hash",
};

describe("InMemoryLedgerRepository", () => {
  it("keeps staged writes private until the unit of work resolves", async () => {
    const repository = new InMemoryLedgerRepository();

    await repository.transaction(async (tx) => {
      await tx.insertModel(model);
      await tx.incrementCounter("totalModels");

      await expect(tx.findModel("M1")).resolves.toEqual(model);
      await expect(tx.counters()).resolves.toEqual({ totalAssets: 0, totalModels: 1 });
      await expect(repository.findModel("M1")).resolves.toBeUndefined();
      await expect(repository.counters()).resolves.toEqual({ totalAssets: 0, totalModels: 0 });
    });

    await expect(repository.findModel("M1")).resolves.toEqual(model);
    await expect(repository.counters()).resolves.toEqual({ totalAssets: 0, totalModels: 1 });
  });

  it("discards every staged write when the unit of work throws", async () => {
    const repository = new InMemoryLedgerRepository();

    await expect(
      repository.transaction(async (tx) => {
        await tx.insertAsset(record);
        await tx.appendHistory(entry);
        await tx.incrementCounter("totalAssets");
        throw new Error("gate failed");
      }),
    ).rejects.toThrow("gate failed");

    await expect(repository.findAsset(1)).resolves.toBeUndefined();
    await expect(repository.findHistoryEntry(1, 0)).resolves.toBeUndefined();
    await expect(repository.counters()).resolves.toEqual({ totalAssets: 0, totalModels: 0 });
  });

  it("never overwrites a history entry", async () => {
    const repository = new InMemoryLedgerRepository();
    await repository.transaction(async (tx) => {
      await tx.insertAsset({ ...record, transferCount: 1 });
      await tx.appendHistory(entry);
    });

    await expect(
      repository.transaction((tx) => tx.appendHistory({ ...entry, toOwner: "mallory" })),
    ).rejects.toBeInstanceOf(HistoryConflictError);
    await expect(repository.findHistoryEntry(1, 0)).resolves.toEqual(entry);
    await expect(repository.listHistory(1)).resolves.toEqual([entry]);
  });

  it("compares transfer counts before replacing a record", async () => {
    const repository = new InMemoryLedgerRepository();
    repository.seedAsset(record);

    await expect(
      repository.transaction((tx) => tx.updateAsset({ ...record, currentOwner: "bob", transferCount: 1 }, 3)),
    ).rejects.toBeInstanceOf(StaleRecordError);
    await expect(repository.findAsset(1)).resolves.toEqual(record);
  });

  it("runs units of work one after another", async () => {
    const repository = new InMemoryLedgerRepository();
    const events: string[] = [];

    const slow = repository.transaction(async () => {
      events.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 10));
      events.push("slow:end");
    });
    const fast = repository.transaction(async () => {
      events.push("fast:start");
      events.push("fast:end");
    });
    await Promise.all([slow, fast]);

    expect(events).toEqual(["slow:start", "slow:end", "fast:start", "fast:end"]);
  });

  it("keeps running after a failed unit of work", async () => {
    const repository = new InMemoryLedgerRepository();

    await expect(repository.transaction(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(repository.transaction(async () => "next")).resolves.toBe("next");
  });

  it("rejects writes through a handle that has already committed", async () => {
    const repository = new InMemoryLedgerRepository();
    const leaked: { tx?: LedgerTransaction } = {};
    await repository.transaction(async (tx) => {
      leaked.tx = tx;
    });

    await expect(leaked.tx?.insertModel(model)).rejects.toThrow("transaction is no longer active");
  });

  it("hands out copies rather than live records", async () => {
    const repository = new InMemoryLedgerRepository();
    repository.seedAsset(record);

    const copy = await repository.findAsset(1);
    if (copy) {
      copy.currentOwner = "mallory";
    }

    await expect(repository.findAsset(1)).resolves.toEqual(record);
  });
});
