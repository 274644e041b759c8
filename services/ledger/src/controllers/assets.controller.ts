import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Patch,
  Post,
} from "@nestjs/common";

import { Caller } from "../caller.decorator.js";
import { RegisterAssetDto } from "../dto/register-asset.dto.js";
import { TransferAssetDto } from "../dto/transfer-asset.dto.js";
import { UpdateScoreDto } from "../dto/update-score.dto.js";
import { LedgerError } from "../errors.js";
import { HistoryLogService } from "../services/history-log.service.js";
import { ProvenanceStoreService } from "../services/provenance-store.service.js";
import { TransferProtocolService } from "../services/transfer-protocol.service.js";
import type { TransferPreview } from "../services/transfer-protocol.service.js";
import type { HistoryEntry, ProvenanceRecord, TransferReceipt } from "../types.js";
import { ParseLedgerIdPipe, validated } from "../validation.js";

@Controller("assets")
export class AssetsController {
  constructor(
    @Inject(ProvenanceStoreService)
    private readonly store: ProvenanceStoreService,
    @Inject(TransferProtocolService)
    private readonly transfers: TransferProtocolService,
    @Inject(HistoryLogService)
    private readonly history: HistoryLogService,
  ) {}

  @Post()
  async register(
    @Caller() caller: string,
    @Body(validated(RegisterAssetDto)) body: RegisterAssetDto,
  ): Promise<ProvenanceRecord> {
    return this.store.registerAsset(caller, body);
  }

  @Get(":assetId")
  async get(@Param("assetId", ParseLedgerIdPipe) assetId: number): Promise<ProvenanceRecord> {
    const record = await this.store.getAsset(assetId);
    if (!record) {
      throw new LedgerError("NftNotFound", `asset ${assetId} does not exist`);
    }
    return record;
  }

  @Patch(":assetId/score")
  async updateScore(
    @Caller() caller: string,
    @Param("assetId", ParseLedgerIdPipe) assetId: number,
    @Body(validated(UpdateScoreDto)) body: UpdateScoreDto,
  ): Promise<ProvenanceRecord> {
    return this.store.updateScore(caller, assetId, body.score);
  }

  @Post(":assetId/transfers")
  @HttpCode(HttpStatus.OK)
  async transfer(
    @Caller() caller: string,
    @Param("assetId", ParseLedgerIdPipe) assetId: number,
    @Body(validated(TransferAssetDto)) body: TransferAssetDto,
  ): Promise<TransferReceipt> {
    return this.transfers.transferAsset(caller, {
      assetId,
      newOwner: body.newOwner,
      price: body.price,
      verificationHash: body.verificationHash,
    });
  }

  @Get(":assetId/transfers/preview")
  async preview(
    @Caller() caller: string,
    @Param("assetId", ParseLedgerIdPipe) assetId: number,
  ): Promise<TransferPreview> {
    return this.transfers.previewTransfer(caller, assetId);
  }

  @Get(":assetId/history")
  async listHistory(@Param("assetId", ParseLedgerIdPipe) assetId: number): Promise<HistoryEntry[]> {
    return this.history.list(assetId);
  }

  @Get(":assetId/history/:index")
  async getHistoryEntry(
    @Param("assetId", ParseLedgerIdPipe) assetId: number,
    @Param("index", ParseLedgerIdPipe) index: number,
  ): Promise<HistoryEntry> {
    const entry = await this.history.getEntry(assetId, index);
    if (!entry) {
      throw new NotFoundException(`no history entry ${index} for asset ${assetId}`);
    }
    return entry;
  }
}
