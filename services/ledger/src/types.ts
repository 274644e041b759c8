export type Principal = string;

export type AssetId = number;

export type BlockHeight = number;

export interface AIModel {
  modelId: string;
  name: string;
  version: string;
  registeredBy: Principal;
  confidenceLevel: number;
  isActive: boolean;
}

export interface VerifierGrant {
  principal: Principal;
  isAuthorized: boolean;
}

export interface ProvenanceRecord {
  assetId: AssetId;
  currentOwner: Principal;
  creator: Principal;
  aiModelId: string;
  authenticityScore: number;
  creationTimestamp: BlockHeight;
  lastVerified: BlockHeight;
  transferCount: number;
  flagged: boolean;
}

export interface HistoryEntry {
  assetId: AssetId;
  transferIndex: number;
  fromOwner: Principal;
  toOwner: Principal;
  timestamp: BlockHeight;
  price: number;
  verificationHash: string;
}

export interface Counters {
  totalAssets: number;
  totalModels: number;
}

export type CounterName = keyof Counters;

/** Identity and clock reading shared by every write a single call makes. */
export interface CallContext {
  caller: Principal;
  blockHeight: BlockHeight;
}

export interface RegisterModelInput {
  modelId: string;
  name: string;
  version: string;
  confidenceLevel: number;
}

export interface RegisterAssetInput {
  assetId: AssetId;
  modelId: string;
  initialScore: number;
}

export interface TransferInput {
  assetId: AssetId;
  newOwner: Principal;
  price: number;
  verificationHash: string;
}

export interface TransferReceipt {
  record: ProvenanceRecord;
  entry: HistoryEntry;
}
