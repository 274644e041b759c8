import { BadRequestException, ParseIntPipe, ValidationPipe } from "@nestjs/common";
import type { ArgumentMetadata, Type } from "@nestjs/common";

/**
 * Body pipe bound to an explicit DTO class, so validation does not depend on
 * emitted parameter type metadata.
 */
export function validated<T>(dto: Type<T>): ValidationPipe {
  return new ValidationPipe({
    expectedType: dto,
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
  });
}

/** Path ids: non-negative integers that fit a JavaScript number exactly. */
export class ParseLedgerIdPipe extends ParseIntPipe {
  async transform(value: string, metadata: ArgumentMetadata): Promise<number> {
    const parsed = await super.transform(value, metadata);
    if (!Number.isSafeInteger(parsed) || parsed < 0) {
      throw new BadRequestException(
        `Validation failed (${metadata.data ?? "id"} must be an integer between 0 and ${Number.MAX_SAFE_INTEGER})`,
      );
    }
    return parsed;
  }
}
