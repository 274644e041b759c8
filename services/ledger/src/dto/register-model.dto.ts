import { IsAscii, IsInt, IsString, Length, MaxLength } from "class-validator";

export class RegisterModelDto {
  @IsAscii()
  @Length(1, 64)
  modelId!: string;

  @IsString()
  @MaxLength(128)
  name!: string;

  @IsString()
  @MaxLength(32)
  version!: string;

  // Range is checked by the registry so it can answer InvalidAuthenticityScore.
  @IsInt()
  confidenceLevel!: number;
}
