import { IsInt, IsNotEmpty, IsString, Matches, Max, MaxLength, Min } from "class-validator";

export class TransferAssetDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  newOwner!: string;

  @IsInt()
  @Min(0)
  @Max(Number.MAX_SAFE_INTEGER)
  price!: number;

  /** Opaque to the ledger and recorded as given, empty included. ASCII keeps 64 characters within 64 bytes. */
  @IsString()
  @Matches(/^[\x00-\x7F]*$/, { message: "verificationHash must contain only ASCII characters" })
  @MaxLength(64)
  verificationHash!: string;
}
