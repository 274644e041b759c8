import type {
  AIModel,
  Counters,
  HistoryEntry,
  LedgerErrorCode,
  ProvenanceRecord,
  RegisterAssetRequest,
  RegisterModelRequest,
  TransferPreview,
  TransferReceipt,
  TransferRequest,
  VerifierGrant,
} from './types.js';

export const PRINCIPAL_HEADER = 'x-ledger-principal';

const LEDGER_ERROR_CODES: readonly LedgerErrorCode[] = [
  'NotAuthorized',
  'NftNotFound',
  'AlreadyRegistered',
  'InvalidAuthenticityScore',
  'TransferFailed',
  'InvalidAiModel',
  'ProvenanceNotFound',
];

export interface LedgerClientOptions {
  baseUrl: string;
  /** Principal sent with every request, as authenticated by the gateway in front of the ledger. */
  principal?: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class LedgerApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: LedgerErrorCode,
  ) {
    super(message);
    this.name = 'LedgerApiError';
  }
}

export class LedgerClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: LedgerClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = {
      ...(options.headers ?? {}),
      ...(options.principal ? { [PRINCIPAL_HEADER]: options.principal } : {}),
    };
  }

  /** Returns a client that acts as `principal`, sharing everything else. */
  as(principal: string): LedgerClient {
    return new LedgerClient({
      baseUrl: this.baseUrl,
      fetchImpl: this.fetchImpl,
      headers: this.defaultHeaders,
      principal,
    });
  }

  async registerModel(payload: RegisterModelRequest): Promise<AIModel> {
    return this.request<AIModel>('POST', '/models', payload);
  }

  async getModel(modelId: string): Promise<AIModel> {
    return this.request<AIModel>('GET', `/models/${encodeURIComponent(modelId)}`);
  }

  async isActiveModel(modelId: string): Promise<boolean> {
    const body = await this.request<{ active: boolean }>('GET', `/models/${encodeURIComponent(modelId)}/active`);
    return body.active;
  }

  async authorizeVerifier(verifier: string): Promise<VerifierGrant> {
    return this.request<VerifierGrant>('POST', '/verifiers', { verifier });
  }

  async isAuthorizedVerifier(principal: string): Promise<boolean> {
    const body = await this.request<VerifierGrant>('GET', `/verifiers/${encodeURIComponent(principal)}`);
    return body.isAuthorized;
  }

  async registerAsset(payload: RegisterAssetRequest): Promise<ProvenanceRecord> {
    return this.request<ProvenanceRecord>('POST', '/assets', payload);
  }

  async getAsset(assetId: number): Promise<ProvenanceRecord> {
    return this.request<ProvenanceRecord>('GET', `/assets/${assetId}`);
  }

  async updateScore(assetId: number, score: number): Promise<ProvenanceRecord> {
    return this.request<ProvenanceRecord>('PATCH', `/assets/${assetId}/score`, { score });
  }

  async transferAsset(assetId: number, payload: TransferRequest): Promise<TransferReceipt> {
    return this.request<TransferReceipt>('POST', `/assets/${assetId}/transfers`, payload);
  }

  async previewTransfer(assetId: number): Promise<TransferPreview> {
    return this.request<TransferPreview>('GET', `/assets/${assetId}/transfers/preview`);
  }

  async getHistory(assetId: number): Promise<HistoryEntry[]> {
    return this.request<HistoryEntry[]>('GET', `/assets/${assetId}/history`);
  }

  async getHistoryEntry(assetId: number, transferIndex: number): Promise<HistoryEntry> {
    return this.request<HistoryEntry>('GET', `/assets/${assetId}/history/${transferIndex}`);
  }

  async getCounters(): Promise<Counters> {
    return this.request<Counters>('GET', '/stats');
  }

  private async request<T>(method: string, path: string, payload?: unknown): Promise<T> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers:
        payload === undefined
          ? this.defaultHeaders
          : { 'Content-Type': 'application/json', ...this.defaultHeaders },
      body: payload === undefined ? undefined : JSON.stringify(payload),
    });

    if (!response.ok) {
      throw await this.toError(method, path, response);
    }

    return (await response.json()) as T;
  }

  private async toError(method: string, path: string, response: Response): Promise<LedgerApiError> {
    const body = await this.readErrorBody(response);
    const code = parseErrorCode(body);
    const prefix = `${method} ${path} failed with ${response.status}`;
    return new LedgerApiError(code ? `${prefix} (${code}): ${body}` : `${prefix}: ${body}`, response.status, code);
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

function parseErrorCode(body: string): LedgerErrorCode | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) {
    return undefined;
  }
  const { error } = parsed;
  return LEDGER_ERROR_CODES.find((code) => code === error);
}

export * from './types.js';
