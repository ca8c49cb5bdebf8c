import { Equals, IsIn, IsNotEmpty, IsNumber, IsPositive, IsString } from "class-validator";
import {
  SUPPORTED_COUNTRY_CODE,
  SUPPORTED_CURRENCY_CODE,
  SUPPORTED_SERVICES,
} from "../tembo.constants";
import type { DisbursementRequest } from "../tembo.types";

export class DisbursementRequestDto implements DisbursementRequest {
  @Equals(SUPPORTED_COUNTRY_CODE, {
    message: `countryCode must be ${SUPPORTED_COUNTRY_CODE}`,
  })
  countryCode!: string;

  @IsString()
  @IsNotEmpty({ message: "accountNo is required" })
  accountNo!: string;

  @IsString()
  @IsNotEmpty({ message: "serviceCode is required" })
  @IsIn(SUPPORTED_SERVICES, {
    message: `serviceCode must be one of: ${SUPPORTED_SERVICES.join(", ")}`,
  })
  serviceCode!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive({ message: "amount must be greater than 0" })
  amount!: number;

  /** MSISDN, or `<BIC>:<ACCOUNT NUMBER>` on the bank rail. */
  @IsString()
  @IsNotEmpty({ message: "msisdn is required" })
  msisdn!: string;

  @IsString()
  @IsNotEmpty({ message: "narration is required" })
  narration!: string;

  @Equals(SUPPORTED_CURRENCY_CODE, {
    message: `currencyCode must be ${SUPPORTED_CURRENCY_CODE}`,
  })
  currencyCode!: string;

  @IsString()
  @IsNotEmpty({ message: "recipientNames is required" })
  recipientNames!: string;

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
