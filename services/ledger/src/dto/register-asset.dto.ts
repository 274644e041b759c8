import { IsInt, IsString, Max, MaxLength, Min } from "class-validator";

export class RegisterAssetDto {
  @IsInt()
  @Min(0)
  @Max(Number.MAX_SAFE_INTEGER)
  assetId!: number;

  @IsString()
  @MaxLength(64)
  modelId!: string;

  @IsInt()
  initialScore!: number;
}
