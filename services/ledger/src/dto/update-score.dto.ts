import { IsInt } from "class-validator";

export class UpdateScoreDto {
  @IsInt()
  score!: number;
}
