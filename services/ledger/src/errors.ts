export type LedgerErrorCode =
  | "NotAuthorized"
  | "NftNotFound"
  | "AlreadyRegistered"
  | "InvalidAuthenticityScore"
  | "TransferFailed"
  | "InvalidAiModel"
  | "ProvenanceNotFound";

export const LEDGER_ERROR_NUMBERS: Record<LedgerErrorCode, number> = {
  NotAuthorized: 100,
  NftNotFound: 101,
  AlreadyRegistered: 102,
  InvalidAuthenticityScore: 103,
  TransferFailed: 104,
  InvalidAiModel: 105,
  // Reserved; no operation raises it yet.
  ProvenanceNotFound: 106,
};

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message?: string) {
    super(message ?? code);
    this.name = "LedgerError";
    this.code = code;
  }

  get number(): number {
    return LEDGER_ERROR_NUMBERS[this.code];
  }
}

/** Raised when a record changed between read and compare-and-swap write. */
export class StaleRecordError extends Error {
  constructor(readonly assetId: number, readonly expectedTransferCount: number) {
    super(`asset ${assetId} changed concurrently (expected transfer count ${expectedTransferCount})`);
    this.name = "StaleRecordError";
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
