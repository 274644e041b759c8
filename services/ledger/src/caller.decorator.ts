import { createParamDecorator, UnauthorizedException } from "@nestjs/common";
import type { ExecutionContext } from "@nestjs/common";
import type { Request } from "express";

/** Header carrying the principal the upstream gateway authenticated. */
export const PRINCIPAL_HEADER = "x-ledger-principal";

export const Caller = createParamDecorator((_data: unknown, context: ExecutionContext): string => {
  const request = context.switchToHttp().getRequest<Request>();
  const principal = request.header(PRINCIPAL_HEADER)?.trim();
  if (!principal) {
    throw new UnauthorizedException(`missing ${PRINCIPAL_HEADER} header`);
  }
  return principal;
});
