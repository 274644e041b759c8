import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import { LedgerError } from "../errors.js";
import type { LedgerReader, LedgerRepository } from "../repository/ledger.repository.js";
import { APP_CONFIG, LEDGER_REPOSITORY } from "../tokens.js";
import type { Principal, VerifierGrant } from "../types.js";

@Injectable()
export class VerifierAuthorizationService {
  private readonly logger = new Logger(VerifierAuthorizationService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(LEDGER_REPOSITORY) private readonly repository: LedgerRepository,
  ) {}

  async authorizeVerifier(caller: Principal, verifier: Principal): Promise<VerifierGrant> {
    const grant = await this.repository.transaction(async (tx) => {
      if (caller !== this.config.registryOwner) {
        throw new LedgerError("NotAuthorized", "only the registry owner may authorize verifiers");
      }
      const authorized: VerifierGrant = { principal: verifier, isAuthorized: true };
      await tx.putVerifier(authorized);
      return authorized;
    });
    this.logger.log(`Authorized verifier ${verifier}`);
    return grant;
  }

  async isAuthorizedVerifier(principal: Principal, reader: LedgerReader = this.repository): Promise<boolean> {
    const grant = await reader.findVerifier(principal);
    return grant?.isAuthorized === true;
  }
}
