import { Inject, Injectable, Logger } from "@nestjs/common";
import { resolveClientConfig } from "./tembo.config";
import { TEMBO_CLIENT_CONFIG } from "./tembo.constants";
import {
  collectionRequestBody,
  decodeBalanceResponse,
  decodeStatement,
  disbursementRequestBody,
  paymentStatusBody,
  statementQueryBody,
} from "./tembo.codec";
import { TemboResult } from "./tembo.errors";
import { TemboHttpTransport } from "./tembo-http.transport";
import {
  prepareBankPayout,
  validateCollectionRequest,
  validateDisbursementRequest,
  validatePaymentStatusQuery,
  validateStatementQuery,
} from "./tembo.validation";
import { parseWebhook } from "./tembo-webhook.validator";
import type {
  BalanceResponse,
  CallOptions,
  ClientConfig,
  CollectionRequest,
  CollectionResponse,
  DisbursementRequest,
  PaymentStatusQuery,
  ResolvedClientConfig,
  StatementEntry,
  StatementQuery,
  WebhookPayload,
} from "./tembo.types";

/**
 * TemboPlus gateway client.
 *
 * Stateless after construction: one instance can serve concurrent callers.
 * Every operation validates locally, dispatches a single POST and resolves to
 * a TemboResult. Gateway and input failures never reject the promise.
 */
@Injectable()
export class TemboClient {
  private readonly logger = new Logger(TemboClient.name);
  readonly config: ResolvedClientConfig;
  private readonly transport: TemboHttpTransport;

  constructor(@Inject(TEMBO_CLIENT_CONFIG) config: ClientConfig) {
    this.config = resolveClientConfig(config);
    this.transport = new TemboHttpTransport(this.config);
    this.logger.log(
      `[Tembo] client ready environment=${this.config.environment} baseUrl=${this.config.baseUrl}`,
    );
  }

  /** Sends a USSD push asking the subscriber to approve a payment. */
  async collectFromMobileMoney(
    req: CollectionRequest,
    opts?: CallOptions,
  ): Promise<TemboResult<CollectionResponse>> {
    const valid = validateCollectionRequest(req);
    if (!valid.ok) return valid;

    this.logger.log(
      `[Tembo] Collection ref=${req.transactionRef} amount=${req.amount} channel=${req.channel} → ${req.msisdn}`,
    );
    return this.transport.postForStatus(
      this.config.endpoints.collection,
      collectionRequestBody(valid.value),
      opts,
    );
  }

  async getCollectionStatus(
    query: PaymentStatusQuery,
    opts?: CallOptions,
  ): Promise<TemboResult<CollectionResponse>> {
    const valid = validatePaymentStatusQuery(query);
    if (!valid.ok) return valid;
    return this.transport.postForStatus(
      this.config.endpoints.collectionStatus,
      paymentStatusBody(valid.value),
      opts,
    );
  }

  /** Status of a wallet-to-mobile or wallet-to-bank payout. */
  async getPaymentStatus(
    query: PaymentStatusQuery,
    opts?: CallOptions,
  ): Promise<TemboResult<CollectionResponse>> {
    const valid = validatePaymentStatusQuery(query);
    if (!valid.ok) return valid;
    return this.transport.postForStatus(
      this.config.endpoints.paymentStatus,
      paymentStatusBody(valid.value),
      opts,
    );
  }

  async getCollectionBalance(opts?: CallOptions): Promise<TemboResult<BalanceResponse>> {
    return this.transport.post(
      this.config.endpoints.collectionBalance,
      undefined,
      "balance response",
      decodeBalanceResponse,
      opts,
    );
  }

  async getMainBalance(opts?: CallOptions): Promise<TemboResult<BalanceResponse>> {
    return this.transport.post(
      this.config.endpoints.mainBalance,
      undefined,
      "balance response",
      decodeBalanceResponse,
      opts,
    );
  }

  /** Every entry in the range, in one reply. */
  async getCollectionStatement(
    query: StatementQuery,
    opts?: CallOptions,
  ): Promise<TemboResult<StatementEntry[]>> {
    return this.statement(this.config.endpoints.collectionStatement, query, opts);
  }

  async getMainStatement(
    query: StatementQuery,
    opts?: CallOptions,
  ): Promise<TemboResult<StatementEntry[]>> {
    return this.statement(this.config.endpoints.mainStatement, query, opts);
  }

  async payWalletToMobile(
    req: DisbursementRequest,
    opts?: CallOptions,
  ): Promise<TemboResult<CollectionResponse>> {
    const valid = validateDisbursementRequest(req);
    if (!valid.ok) return valid;

    this.logger.log(
      `[Tembo] Payout ref=${req.transactionRef} amount=${req.amount} ${req.currencyCode} service=${req.serviceCode}`,
    );
    return this.transport.postForStatus(
      this.config.endpoints.walletToMobile,
      disbursementRequestBody(valid.value),
      opts,
    );
  }

  /**
   * Bank payout over the wallet-to-mobile endpoint. `msisdn` carries
   * `<BIC>:<ACCOUNT NUMBER>`; serviceCode may be left empty.
   */
  async payWalletToBank(
    req: DisbursementRequest,
    opts?: CallOptions,
  ): Promise<TemboResult<CollectionResponse>> {
    const pinned = prepareBankPayout(req);
    if (!pinned.ok) return pinned;
    return this.payWalletToMobile(pinned.value, opts);
  }

  validateWebhook(raw: string | Buffer): TemboResult<WebhookPayload> {
    return parseWebhook(raw);
  }

  private async statement(
    path: string,
    query: StatementQuery,
    opts?: CallOptions,
  ): Promise<TemboResult<StatementEntry[]>> {
    const valid = validateStatementQuery(query);
    if (!valid.ok) return valid;
    return this.transport.post(path, statementQueryBody(valid.value), "statement", decodeStatement, opts);
  }
}
