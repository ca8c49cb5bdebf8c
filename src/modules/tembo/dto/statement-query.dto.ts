import { IsNotEmpty, IsOptional, IsString } from "class-validator";
import type { StatementQuery } from "../tembo.types";

export class StatementQueryDto implements StatementQuery {
  @IsString()
  @IsNotEmpty({ message: "startDate is required" })
  startDate!: string;

  @IsString()
  @IsNotEmpty({ message: "endDate is required" })
  endDate!: string;

  @IsOptional()
  @IsString()
  walletId?: string;
}
