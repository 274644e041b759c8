import type { ClockConfig } from "./config.js";
import type { BlockHeight } from "./types.js";

export interface LedgerClock {
  /** Current block height. Successive readings never decrease. */
  blockHeight(): BlockHeight;
}

export class BlockHeightClock implements LedgerClock {
  private last = 0;

  constructor(
    private readonly config: ClockConfig,
    private readonly now: () => number = Date.now,
  ) {}

  blockHeight(): BlockHeight {
    const elapsed = Math.max(0, this.now() - this.config.genesisTime);
    const height = Math.floor(elapsed / this.config.blockIntervalMs);
    this.last = Math.max(this.last, height);
    return this.last;
  }
}

export class ManualClock implements LedgerClock {
  constructor(private height: BlockHeight = 0) {}

  blockHeight(): BlockHeight {
    return this.height;
  }

  advance(blocks = 1): BlockHeight {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new Error("clock can only advance by a non-negative whole number of blocks");
    }
    this.height += blocks;
    return this.height;
  }
}
