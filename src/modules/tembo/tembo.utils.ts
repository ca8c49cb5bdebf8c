import { randomBytes } from "crypto";
import {
  CHANNELS,
  ChannelCode,
  SUPPORTED_CHANNELS,
  SUPPORTED_SERVICES,
  ServiceCode,
} from "./tembo.constants";
import { err, ok, TemboResult, TemboValidationError } from "./tembo.errors";
import type { CollectionRequest } from "./tembo.types";

/**
 * Value of the x-request-id header. Time-prefixed with a random suffix so
 * calls issued within the same millisecond stay distinct.
 */
export function generateRequestId(now: Date = new Date()): string {
  return `req_${now.getTime()}_${randomBytes(4).toString("hex")}`;
}

/** `<prefix>_<unix seconds>` */
export function generateTransactionRef(prefix: string, now: Date = new Date()): string {
  return `${prefix}_${Math.floor(now.getTime() / 1000)}`;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTransactionDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Normalises a Tanzanian phone number to 255XXXXXXXXX.
 * "+255712345678", "0712345678" and "712345678" all map to "255712345678".
 */
export function formatMsisdn(phoneNumber: string): string {
  let p = phoneNumber;
  if (p.startsWith("+")) p = p.slice(1);
  if (p.startsWith("0")) p = p.slice(1);
  if (p.length === 9 && (p[0] === "6" || p[0] === "7")) p = `255${p}`;
  return p;
}

/** Accepts 10..15 characters carrying the 255 country prefix. */
export function validateMsisdn(msisdn: string): TemboResult<string> {
  if (msisdn.length < 10 || msisdn.length > 15) {
    return err(TemboValidationError.single("msisdn", `invalid MSISDN length: ${msisdn}`));
  }
  if (!msisdn.startsWith("255")) {
    return err(
      TemboValidationError.single(
        "msisdn",
        `MSISDN should start with country code 255 for Tanzania: ${msisdn}`,
      ),
    );
  }
  return ok(msisdn);
}

export function getSupportedChannels(): ChannelCode[] {
  return [...SUPPORTED_CHANNELS];
}

export function getSupportedServices(): ServiceCode[] {
  return [...SUPPORTED_SERVICES];
}

export function isSupportedChannel(channel: string): channel is ChannelCode {
  return SUPPORTED_CHANNELS.some((c) => c === channel);
}

export function isSupportedService(service: string): service is ServiceCode {
  return SUPPORTED_SERVICES.some((s) => s === service);
}

/** Carrier behind a collection channel, or "Unknown". */
export function getChannelProvider(channel: string): string {
  return isSupportedChannel(channel) ? CHANNELS[channel].provider : "Unknown";
}

export function buildCollectionRequest(
  phoneNumber: string,
  channel: string,
  amount: number,
  narration: string,
  callbackUrl: string,
  now: Date = new Date(),
): CollectionRequest {
  return {
    msisdn: formatMsisdn(phoneNumber),
    channel,
    amount,
    narration,
    transactionRef: generateTransactionRef("TXN", now),
    transactionDate: formatTransactionDate(now),
    callbackUrl,
  };
}
