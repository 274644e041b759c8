import { Body, Controller, Get, Inject, Param, Post } from "@nestjs/common";

import { Caller } from "../caller.decorator.js";
import { AuthorizeVerifierDto } from "../dto/authorize-verifier.dto.js";
import { VerifierAuthorizationService } from "../services/verifier-authorization.service.js";
import type { VerifierGrant } from "../types.js";
import { validated } from "../validation.js";

@Controller("verifiers")
export class VerifiersController {
  constructor(
    @Inject(VerifierAuthorizationService)
    private readonly verifiers: VerifierAuthorizationService,
  ) {}

  @Post()
  async authorize(
    @Caller() caller: string,
    @Body(validated(AuthorizeVerifierDto)) body: AuthorizeVerifierDto,
  ): Promise<VerifierGrant> {
    return this.verifiers.authorizeVerifier(caller, body.verifier);
  }

  @Get(":principal")
  async get(@Param("principal") principal: string): Promise<VerifierGrant> {
    return { principal, isAuthorized: await this.verifiers.isAuthorizedVerifier(principal) };
  }
}
