import { IsNotEmpty, IsString, ValidateIf } from "class-validator";
import type { PaymentStatusQuery } from "../tembo.types";

const MESSAGE = "either transactionRef or transactionId is required";

/** Each identifier is only checked when the other one is missing. */
export class PaymentStatusQueryDto implements PaymentStatusQuery {
  @ValidateIf((o: PaymentStatusQueryDto) => !o.transactionId)
  @IsString()
  @IsNotEmpty({ message: MESSAGE })
  transactionRef?: string;

  @ValidateIf((o: PaymentStatusQueryDto) => !o.transactionRef)
  @IsString()
  @IsNotEmpty({ message: MESSAGE })
  transactionId?: string;
}
