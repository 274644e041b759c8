import { Controller, Get, Inject } from "@nestjs/common";

import { ProvenanceStoreService } from "../services/provenance-store.service.js";
import type { Counters } from "../types.js";

@Controller("stats")
export class StatsController {
  constructor(
    @Inject(ProvenanceStoreService)
    private readonly store: ProvenanceStoreService,
  ) {}

  @Get()
  async counters(): Promise<Counters> {
    return this.store.counters();
  }
}
