export { TemboModule } from "./tembo.module";
export type { TemboModuleOptions, TemboWebhookOptions } from "./tembo.module";
export { TemboClient } from "./tembo.client";
export { TemboHttpTransport } from "./tembo-http.transport";
export { TemboWebhookController } from "./tembo-webhook.controller";
export { resolveClientConfig } from "./tembo.config";
export * from "./tembo.constants";
export * from "./tembo.errors";
export type * from "./tembo.types";
export {
  decodeTolerantNumber,
  amountOrUndefined,
  ABSENT,
  present,
} from "./tolerant-number";
export type { OptionalAmount } from "./tolerant-number";
export {
  prepareBankPayout,
  validateCollectionRequest,
  validateDisbursementRequest,
  validatePaymentStatusQuery,
  validateStatementQuery,
} from "./tembo.validation";
export {
  collectionRequestBody,
  decodeApiErrorEnvelope,
  decodeBalanceResponse,
  decodeCollectionResponse,
  decodeStatement,
  decodeWebhookPayload,
  disbursementRequestBody,
} from "./tembo.codec";
export { parseWebhook, isFailedWebhook, isSuccessfulWebhook } from "./tembo-webhook.validator";
export {
  buildCollectionRequest,
  formatMsisdn,
  formatTransactionDate,
  generateRequestId,
  generateTransactionRef,
  getChannelProvider,
  getSupportedChannels,
  getSupportedServices,
  isSupportedChannel,
  isSupportedService,
  validateMsisdn,
} from "./tembo.utils";
export { CollectionRequestDto } from "./dto/collection-request.dto";
export { DisbursementRequestDto } from "./dto/disbursement-request.dto";
export { PaymentStatusQueryDto } from "./dto/payment-status-query.dto";
export { StatementQueryDto } from "./dto/statement-query.dto";
