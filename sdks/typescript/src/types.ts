export type LedgerErrorCode =
  | 'NotAuthorized'
  | 'NftNotFound'
  | 'AlreadyRegistered'
  | 'InvalidAuthenticityScore'
  | 'TransferFailed'
  | 'InvalidAiModel'
  | 'ProvenanceNotFound';

export interface AIModel {
  modelId: string;
  name: string;
  version: string;
  registeredBy: string;
  confidenceLevel: number;
  isActive: boolean;
}

export interface VerifierGrant {
  principal: string;
  isAuthorized: boolean;
}

export interface ProvenanceRecord {
  assetId: number;
  currentOwner: string;
  creator: string;
  aiModelId: string;
  authenticityScore: number;
  creationTimestamp: number;
  lastVerified: number;
  transferCount: number;
  flagged: boolean;
}

export interface HistoryEntry {
  assetId: number;
  transferIndex: number;
  fromOwner: string;
  toOwner: string;
  timestamp: number;
  price: number;
  verificationHash: string;
}

export interface Counters {
  totalAssets: number;
  totalModels: number;
}

export interface RegisterModelRequest {
  modelId: string;
  name: string;
  version: string;
  confidenceLevel: number;
}

export interface RegisterAssetRequest {
  assetId: number;
  modelId: string;
  initialScore: number;
}

export interface TransferRequest {
  newOwner: string;
  price: number;
  verificationHash: string;
}

export interface TransferReceipt {
  record: ProvenanceRecord;
  entry: HistoryEntry;
}

export type TransferPreview =
  | { assetId: number; eligible: true; updatedScore: number }
  | { assetId: number; eligible: false; failure: LedgerErrorCode; message: string };
