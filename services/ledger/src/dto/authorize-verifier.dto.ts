import { IsNotEmpty, IsString, MaxLength } from "class-validator";

export class AuthorizeVerifierDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  verifier!: string;
}
