import { err, ok, TemboApiError, TemboDecodeError, TemboResult } from "./tembo.errors";
import { decodeTolerantNumber } from "./tolerant-number";
import type {
  BalanceResponse,
  CollectionRequest,
  CollectionResponse,
  DisbursementRequest,
  PaymentStatusQuery,
  StatementEntry,
  StatementQuery,
  WebhookPayload,
} from "./tembo.types";

// ── Request bodies ────────────────────────────────────────────────────────────
// Field lists are explicit so callers' extra properties never reach the wire.

export function collectionRequestBody(req: CollectionRequest): Record<string, unknown> {
  return {
    msisdn: req.msisdn,
    channel: req.channel,
    amount: req.amount,
    narration: req.narration,
    transactionRef: req.transactionRef,
    transactionDate: req.transactionDate,
    callbackUrl: req.callbackUrl,
  };
}

export function disbursementRequestBody(req: DisbursementRequest): Record<string, unknown> {
  return {
    countryCode: req.countryCode,
    accountNo: req.accountNo,
    serviceCode: req.serviceCode,
    amount: req.amount,
    msisdn: req.msisdn,
    narration: req.narration,
    currencyCode: req.currencyCode,
    recipientNames: req.recipientNames,
    transactionRef: req.transactionRef,
    transactionDate: req.transactionDate,
    callbackUrl: req.callbackUrl,
  };
}

/** Empty identifiers are omitted. */
export function paymentStatusBody(query: PaymentStatusQuery): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (query.transactionRef) body.transactionRef = query.transactionRef;
  if (query.transactionId) body.transactionId = query.transactionId;
  return body;
}

export function statementQueryBody(query: StatementQuery): Record<string, unknown> {
  const body: Record<string, unknown> = {
    startDate: query.startDate,
    endDate: query.endDate,
  };
  if (query.walletId) body.walletId = query.walletId;
  return body;
}

// ── Response decoding ─────────────────────────────────────────────────────────

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJson(subject: string, raw: string): TemboResult<unknown> {
  try {
    return ok(JSON.parse(raw));
  } catch (e) {
    const problem = e instanceof Error ? e.message : String(e);
    return err(new TemboDecodeError(subject, `invalid JSON (${problem})`, raw));
  }
}

/**
 * Reads typed fields off a parsed JSON object. Missing or null fields take the
 * zero value; a present field of the wrong type records the first problem.
 */
class FieldReader {
  problem?: string;

  constructor(private readonly obj: JsonObject) {}

  string(key: string): string {
    const value = this.obj[key];
    if (value === undefined || value === null) return "";
    if (typeof value === "string") return value;
    this.fail(`field "${key}" must be a string`);
    return "";
  }

  number(key: string): number {
    const value = this.obj[key];
    if (value === undefined || value === null) return 0;
    if (typeof value === "number") return value;
    this.fail(`field "${key}" must be a number`);
    return 0;
  }

  private fail(problem: string) {
    if (!this.problem) this.problem = problem;
  }
}

function finish<T>(subject: string, reader: FieldReader, value: T): TemboResult<T> {
  return reader.problem ? err(new TemboDecodeError(subject, reader.problem)) : ok(value);
}

function readStatus(subject: string, obj: JsonObject): TemboResult<CollectionResponse> {
  const r = new FieldReader(obj);
  return finish(subject, r, {
    statusCode: r.string("statusCode"),
    transactionRef: r.string("transactionRef"),
    transactionId: r.string("transactionId"),
  });
}

export function decodeCollectionResponse(value: unknown): TemboResult<CollectionResponse> {
  const subject = "collection response";
  if (!isObject(value)) return err(new TemboDecodeError(subject, "expected a JSON object"));
  if (typeof value.statusCode !== "string") {
    return err(new TemboDecodeError(subject, `field "statusCode" must be a string`));
  }
  return readStatus(subject, value);
}

export function decodeWebhookPayload(value: unknown): TemboResult<WebhookPayload> {
  const subject = "webhook payload";
  if (!isObject(value)) return err(new TemboDecodeError(subject, "expected a JSON object"));
  return readStatus(subject, value);
}

export function decodeBalanceResponse(value: unknown): TemboResult<BalanceResponse> {
  const subject = "balance response";
  if (!isObject(value)) return err(new TemboDecodeError(subject, "expected a JSON object"));

  const r = new FieldReader(value);
  return finish(subject, r, {
    availableBalance: r.number("availableBalance"),
    currentBalance: r.number("currentBalance"),
    accountNo: r.string("accountNo"),
    accountStatus: r.string("accountStatus"),
    accountName: r.string("accountName"),
  });
}

export function decodeStatementEntry(value: unknown, index: number): TemboResult<StatementEntry> {
  const subject = `statement entry #${index}`;
  if (!isObject(value)) return err(new TemboDecodeError(subject, "expected a JSON object"));

  const r = new FieldReader(value);
  return finish(subject, r, {
    accountNo: r.string("accountNo"),
    debitOrCredit: r.string("debitOrCredit"),
    tranRefNo: r.string("tranRefNo"),
    narration: r.string("narration"),
    txnDate: r.string("txnDate"),
    valueDate: r.string("valueDate"),
    amountCredited: decodeTolerantNumber(value.amountCredited),
    amountDebited: decodeTolerantNumber(value.amountDebited),
    balance: r.number("balance"),
  });
}

export function decodeStatement(value: unknown): TemboResult<StatementEntry[]> {
  if (value === null) return ok([]);
  if (!Array.isArray(value)) {
    return err(new TemboDecodeError("statement", "expected a JSON array"));
  }
  const entries: StatementEntry[] = [];
  for (let i = 0; i < value.length; i++) {
    const entry = decodeStatementEntry(value[i], i);
    if (!entry.ok) return err(entry.error);
    entries.push(entry.value);
  }
  return ok(entries);
}

/**
 * Gateway error envelope, e.g. `{"statusCode":401,"reason":"INVALID_CREDENTIALS"}`.
 * Returns undefined unless the body carries a numeric, non-zero status code.
 */
export function decodeApiErrorEnvelope(raw: string): TemboApiError | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isObject(value)) return undefined;
  if (typeof value.statusCode !== "number" || value.statusCode === 0) return undefined;

  const reason = typeof value.reason === "string" && value.reason ? value.reason : undefined;
  const message = typeof value.message === "string" && value.message ? value.message : undefined;
  return new TemboApiError(value.statusCode, reason, message, value.details);
}
