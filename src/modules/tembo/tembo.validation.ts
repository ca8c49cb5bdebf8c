import { ClassConstructor, plainToInstance } from "class-transformer";
import { validateSync, ValidationError } from "class-validator";
import { CollectionRequestDto } from "./dto/collection-request.dto";
import { DisbursementRequestDto } from "./dto/disbursement-request.dto";
import { PaymentStatusQueryDto } from "./dto/payment-status-query.dto";
import { StatementQueryDto } from "./dto/statement-query.dto";
import { BANK_PAYOUT_SERVICE } from "./tembo.constants";
import { err, ok, TemboResult, TemboValidationError, ValidationIssue } from "./tembo.errors";
import type {
  CollectionRequest,
  DisbursementRequest,
  PaymentStatusQuery,
  StatementQuery,
} from "./tembo.types";

function toIssues(errors: ValidationError[]): ValidationIssue[] {
  return errors.map((e) => ({
    field: e.property,
    messages: Object.values(e.constraints ?? {}),
  }));
}

function check<T extends object>(
  dto: ClassConstructor<T>,
  input: T,
): TemboResult<T> {
  const instance = plainToInstance(dto, input);
  const errors = validateSync(instance, { skipMissingProperties: false });
  if (errors.length > 0) {
    return err(new TemboValidationError(toIssues(errors)));
  }
  return ok(input);
}

export function validateCollectionRequest(
  req: CollectionRequest,
): TemboResult<CollectionRequest> {
  return check(CollectionRequestDto, req);
}

export function validateDisbursementRequest(
  req: DisbursementRequest,
): TemboResult<DisbursementRequest> {
  return check(DisbursementRequestDto, req);
}

export function validatePaymentStatusQuery(
  query: PaymentStatusQuery,
): TemboResult<PaymentStatusQuery> {
  return check(PaymentStatusQueryDto, query);
}

export function validateStatementQuery(
  query: StatementQuery,
): TemboResult<StatementQuery> {
  return check(StatementQueryDto, query);
}

/**
 * Pins a disbursement to the bank rail. An empty service code is filled in;
 * any other explicit code is rejected rather than overridden.
 */
export function prepareBankPayout(
  req: DisbursementRequest,
): TemboResult<DisbursementRequest> {
  if (!req.serviceCode) {
    return ok({ ...req, serviceCode: BANK_PAYOUT_SERVICE });
  }
  if (req.serviceCode !== BANK_PAYOUT_SERVICE) {
    return err(
      TemboValidationError.single(
        "serviceCode",
        `serviceCode must be ${BANK_PAYOUT_SERVICE} for bank payouts`,
      ),
    );
  }
  return ok(req);
}
