/**
 * Fixed vocabulary of the TemboPlus gateway.
 *
 * Every table is frozen; clients receive them through their resolved config
 * so tests can point a client at a different endpoint set without touching
 * module state.
 */

export const TEMBO_STATUS = Object.freeze({
  PENDING_ACK: "PENDING_ACK",
  PAYMENT_ACCEPTED: "PAYMENT_ACCEPTED",
  PAYMENT_REJECTED: "PAYMENT_REJECTED",
  GENERIC_ERROR: "GENERIC_ERROR",
} as const);

export type TemboStatusCode = (typeof TEMBO_STATUS)[keyof typeof TEMBO_STATUS];

/** Status codes that turn a 2xx reply into a business failure. */
export const FAILED_STATUS_CODES: ReadonlySet<string> = new Set([
  TEMBO_STATUS.PAYMENT_REJECTED,
  TEMBO_STATUS.GENERIC_ERROR,
]);

// ── Collection channels (USSD push, C2B) ─────────────────────────────────────

export const CHANNELS = Object.freeze({
  "TZ-TIGO-C2B": { provider: "Tigo" },
  "TZ-AIRTEL-C2B": { provider: "Airtel" },
  "TZ-HALOTEL-C2B": { provider: "Halotel" },
} as const);

export type ChannelCode = keyof typeof CHANNELS;

export const SUPPORTED_CHANNELS: readonly ChannelCode[] = Object.freeze([
  "TZ-TIGO-C2B",
  "TZ-AIRTEL-C2B",
  "TZ-HALOTEL-C2B",
] as const);

// ── Disbursement services (B2C) ──────────────────────────────────────────────

export const SERVICES = Object.freeze({
  "TZ-TIGO-B2C": { rail: "mobile", provider: "Tigo" },
  "TZ-AIRTEL-B2C": { rail: "mobile", provider: "Airtel" },
  "TZ-BANK-B2C": { rail: "bank", provider: "Bank" },
} as const);

export type ServiceCode = keyof typeof SERVICES;

export const SUPPORTED_SERVICES: readonly ServiceCode[] = Object.freeze([
  "TZ-TIGO-B2C",
  "TZ-AIRTEL-B2C",
  "TZ-BANK-B2C",
] as const);

export const BANK_PAYOUT_SERVICE: ServiceCode = "TZ-BANK-B2C";

export const SUPPORTED_COUNTRY_CODE = "TZ";
export const SUPPORTED_CURRENCY_CODE = "TZS";

// ── Hosts and paths ──────────────────────────────────────────────────────────

export type TemboEnvironment = "sandbox" | "production";

export const BASE_URLS: Readonly<Record<TemboEnvironment, string>> = Object.freeze({
  sandbox: "https://sandbox.temboplus.com",
  production: "https://api.temboplus.com",
});

export const DEFAULT_ENDPOINTS = Object.freeze({
  collection: "/tembo/v1/collection",
  collectionStatus: "/tembo/v1/collection/status",
  collectionBalance: "/tembo/v1/wallet/collection-balance",
  collectionStatement: "/tembo/v1/wallet/collection-statement",
  mainBalance: "/tembo/v1/wallet/main-balance",
  mainStatement: "/tembo/v1/wallet/main-statement",
  walletToMobile: "/tembo/v1/payment/wallet-to-mobile",
  paymentStatus: "/tembo/v1/payment/status",
});

export type EndpointName = keyof typeof DEFAULT_ENDPOINTS;
export type EndpointTable = Readonly<Record<EndpointName, string>>;

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Injection token for the resolved client configuration. */
export const TEMBO_CLIENT_CONFIG = Symbol("TEMBO_CLIENT_CONFIG");
/** Injection token for the caller-supplied webhook handler. */
export const TEMBO_WEBHOOK_HANDLER = Symbol("TEMBO_WEBHOOK_HANDLER");
