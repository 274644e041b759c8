import { Body, Controller, Get, Inject, NotFoundException, Param, Post } from "@nestjs/common";

import { Caller } from "../caller.decorator.js";
import { RegisterModelDto } from "../dto/register-model.dto.js";
import { ModelRegistryService } from "../services/model-registry.service.js";
import type { AIModel } from "../types.js";
import { validated } from "../validation.js";

@Controller("models")
export class ModelsController {
  constructor(
    @Inject(ModelRegistryService)
    private readonly registry: ModelRegistryService,
  ) {}

  @Post()
  async register(
    @Caller() caller: string,
    @Body(validated(RegisterModelDto)) body: RegisterModelDto,
  ): Promise<AIModel> {
    return this.registry.registerModel(caller, body);
  }

  @Get(":modelId")
  async get(@Param("modelId") modelId: string): Promise<AIModel> {
    const model = await this.registry.getModel(modelId);
    if (!model) {
      throw new NotFoundException(`model ${modelId} is not registered`);
    }
    return model;
  }

  @Get(":modelId/active")
  async isActive(@Param("modelId") modelId: string): Promise<{ modelId: string; active: boolean }> {
    return { modelId, active: await this.registry.isActiveModel(modelId) };
  }
}
