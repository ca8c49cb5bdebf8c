import { IsIn, IsNotEmpty, IsNumber, IsPositive, IsString } from "class-validator";
import { SUPPORTED_CHANNELS } from "../tembo.constants";
import type { CollectionRequest } from "../tembo.types";

export class CollectionRequestDto implements CollectionRequest {
  @IsString()
  @IsNotEmpty({ message: "msisdn is required" })
  msisdn!: string;

  @IsString()
  @IsNotEmpty({ message: "channel is required" })
  @IsIn(SUPPORTED_CHANNELS, {
    message: `channel must be one of: ${SUPPORTED_CHANNELS.join(", ")}`,
  })
  channel!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive({ message: "amount must be greater than 0" })
  amount!: number;

  @IsString()
  @IsNotEmpty({ message: "narration is required" })
  narration!: string;

  @IsString()
  @IsNotEmpty({ message: "transactionRef is required" })
  transactionRef!: string;

  @IsString()
  @IsNotEmpty({ message: "transactionDate is required" })
  transactionDate!: string;

  @IsString()
  @IsNotEmpty({ message: "callbackUrl is required" })
  callbackUrl!: string;
}
