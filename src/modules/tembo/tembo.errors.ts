import type { CollectionResponse } from "./tembo.types";

export interface ValidationIssue {
  field: string;
  messages: string[];
}

/** Local, pre-flight rejection. The request never reached the network. */
export class TemboValidationError extends Error {
  readonly kind = "validation" as const;

  constructor(readonly issues: ValidationIssue[]) {
    super(
      `Tembo validation failed: ${issues
        .map((i) => `${i.field} (${i.messages.join("; ")})`)
        .join(", ")}`,
    );
    this.name = "TemboValidationError";
  }

  static single(field: string, message: string): TemboValidationError {
    return new TemboValidationError([{ field, messages: [message] }]);
  }
}

export type TransportFailure = "network" | "timeout" | "cancelled" | "status";

/**
 * Connection failure, timeout, cancellation, or a non-2xx reply without a
 * gateway error envelope. A cancelled call has an unknown outcome: the
 * gateway may still have accepted it.
 */
export class TemboTransportError extends Error {
  readonly kind = "transport" as const;

  constructor(
    readonly failure: TransportFailure,
    message: string,
    readonly httpStatus?: number,
    readonly body?: string,
  ) {
    super(message);
    this.name = "TemboTransportError";
  }
}

/** Non-2xx reply carrying the gateway's own error envelope. */
export class TemboApiError extends Error {
  readonly kind = "api" as const;

  constructor(
    readonly statusCode: number,
    readonly reason?: string,
    readonly gatewayMessage?: string,
    readonly details?: unknown,
  ) {
    super(
      reason
        ? `TemboPlus API Error [${statusCode}]: ${reason}`
        : gatewayMessage
          ? `TemboPlus API Error [${statusCode}]: ${gatewayMessage}`
          : `TemboPlus API Error [${statusCode}]`,
    );
    this.name = "TemboApiError";
  }
}

/** 2xx reply whose payload status reports a rejected or failed operation. */
export class TemboBusinessError extends Error {
  readonly kind = "business" as const;

  constructor(
    readonly statusCode: string,
    readonly response: CollectionResponse,
  ) {
    super(`TemboPlus request failed [${statusCode}] ref=${response.transactionRef}`);
    this.name = "TemboBusinessError";
  }
}

/** Response or webhook body that does not match the expected shape. */
export class TemboDecodeError extends Error {
  readonly kind = "decode" as const;

  constructor(
    readonly subject: string,
    problem: string,
    readonly body?: string,
  ) {
    super(`Failed to decode ${subject}: ${problem}`);
    this.name = "TemboDecodeError";
  }
}

export type TemboError =
  | TemboValidationError
  | TemboTransportError
  | TemboApiError
  | TemboBusinessError
  | TemboDecodeError;

export type TemboErrorKind = TemboError["kind"];

export type TemboResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: TemboError };

export function ok<T>(value: T): TemboResult<T> {
  return { ok: true, value };
}

export function err<T = never>(error: TemboError): TemboResult<T> {
  return { ok: false, error };
}

export function isTemboError(value: unknown): value is TemboError {
  return (
    value instanceof TemboValidationError ||
    value instanceof TemboTransportError ||
    value instanceof TemboApiError ||
    value instanceof TemboBusinessError ||
    value instanceof TemboDecodeError
  );
}
