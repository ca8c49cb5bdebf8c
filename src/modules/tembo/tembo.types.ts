import type { AxiosAdapter } from "axios";
import type { OptionalAmount } from "./tolerant-number";
import type { EndpointTable, TemboEnvironment } from "./tembo.constants";

/** Static credentials carried as headers on every call. Never logged. */
export interface Credentials {
  accountId: string;
  secretKey: string;
}

export interface ClientConfig extends Credentials {
  environment: TemboEnvironment;
  /** Per-call timeout. Defaults to 30s. */
  timeoutMs?: number;
  /** Overrides the environment host, e.g. a local mock of the gateway. */
  baseUrl?: string;
  endpoints?: Partial<EndpointTable>;
  /** axios adapter used for dispatch; defaults to the platform adapter. */
  adapter?: AxiosAdapter;
}

/** Output of `resolveClientConfig`: frozen, with every default applied. */
export interface ResolvedClientConfig {
  readonly environment: TemboEnvironment;
  readonly baseUrl: string;
  readonly credentials: Readonly<Credentials>;
  readonly timeoutMs: number;
  readonly endpoints: EndpointTable;
  readonly adapter?: AxiosAdapter;
}

export interface CallOptions {
  /** Aborts the in-flight call; the gateway outcome is then unknown. */
  signal?: AbortSignal;
}

export interface CollectionRequest {
  /** Phone number in the form 255XXXXXXXXX. */
  msisdn: string;
  channel: string;
  amount: number;
  narration: string;
  transactionRef: string;
  /** YYYY-MM-DD HH:mm:ss */
  transactionDate: string;
  callbackUrl: string;
}

export interface DisbursementRequest {
  countryCode: string;
  /** Source wallet account number. */
  accountNo: string;
  serviceCode: string;
  amount: number;
  /** Recipient MSISDN, or `<BIC>:<ACCOUNT NUMBER>` for bank payouts. */
  msisdn: string;
  narration: string;
  currencyCode: string;
  recipientNames: string;
  transactionRef: string;
  transactionDate: string;
  callbackUrl: string;
}

export interface PaymentStatusQuery {
  transactionRef?: string;
  transactionId?: string;
}

/** Reply to collections, disbursements and status queries. */
export interface CollectionResponse {
  statusCode: string;
  transactionRef: string;
  transactionId: string;
}

export interface BalanceResponse {
  availableBalance: number;
  currentBalance: number;
  accountNo: string;
  accountStatus: string;
  accountName: string;
}

export interface StatementQuery {
  startDate: string;
  endDate: string;
  walletId?: string;
}

export interface StatementEntry {
  accountNo: string;
  debitOrCredit: string;
  tranRefNo: string;
  narration: string;
  txnDate: string;
  valueDate: string;
  amountCredited: OptionalAmount;
  amountDebited: OptionalAmount;
  balance: number;
}

export interface WebhookPayload {
  statusCode: string;
  transactionRef: string;
  transactionId: string;
}

/** Caller logic invoked for every valid webhook delivery. */
export interface TemboWebhookHandler {
  handle(payload: WebhookPayload): Promise<void>;
}
