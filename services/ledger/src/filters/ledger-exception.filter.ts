import { Catch, HttpStatus, Logger } from "@nestjs/common";
import type { ArgumentsHost, ExceptionFilter } from "@nestjs/common";
import type { Response } from "express";

import { LedgerError, StaleRecordError } from "../errors.js";
import type { LedgerErrorCode } from "../errors.js";
import { HistoryConflictError } from "../repository/ledger.repository.js";

const STATUS_BY_CODE: Record<LedgerErrorCode, HttpStatus> = {
  NotAuthorized: HttpStatus.FORBIDDEN,
  NftNotFound: HttpStatus.NOT_FOUND,
  ProvenanceNotFound: HttpStatus.NOT_FOUND,
  AlreadyRegistered: HttpStatus.CONFLICT,
  InvalidAuthenticityScore: HttpStatus.UNPROCESSABLE_ENTITY,
  InvalidAiModel: HttpStatus.UNPROCESSABLE_ENTITY,
  TransferFailed: HttpStatus.CONFLICT,
};

export interface LedgerErrorBody {
  statusCode: number;
  error: string;
  code?: number;
  message: string;
}

@Catch(LedgerError, StaleRecordError, HistoryConflictError)
export class LedgerExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(LedgerExceptionFilter.name);

  catch(exception: LedgerError | StaleRecordError | HistoryConflictError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = toBody(exception);
    this.logger.warn(`${body.error}: ${body.message}`);
    response.status(body.statusCode).json(body);
  }
}

function toBody(exception: LedgerError | StaleRecordError | HistoryConflictError): LedgerErrorBody {
  if (exception instanceof LedgerError) {
    return {
      statusCode: STATUS_BY_CODE[exception.code],
      error: exception.code,
      code: exception.number,
      message: exception.message,
    };
  }
  return {
    statusCode: HttpStatus.CONFLICT,
    error: exception.name,
    message: exception.message,
  };
}
