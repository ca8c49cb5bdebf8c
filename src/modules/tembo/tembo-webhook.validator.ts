import { decodeWebhookPayload, parseJson } from "./tembo.codec";
import { TEMBO_STATUS } from "./tembo.constants";
import { err, ok, TemboResult, TemboValidationError, ValidationIssue } from "./tembo.errors";
import type { WebhookPayload } from "./tembo.types";

/**
 * Parses a gateway callback body. No signature check: the gateway does not
 * sign its callbacks.
 */
export function parseWebhook(raw: string | Buffer): TemboResult<WebhookPayload> {
  const text = typeof raw === "string" ? raw : raw.toString("utf8");

  const parsed = parseJson("webhook payload", text);
  if (!parsed.ok) return parsed;

  const decoded = decodeWebhookPayload(parsed.value);
  if (!decoded.ok) return decoded;

  const payload = decoded.value;
  if (!payload.transactionRef || !payload.transactionId) {
    const issues: ValidationIssue[] = [];
    if (!payload.transactionRef) {
      issues.push({ field: "transactionRef", messages: ["transactionRef is required"] });
    }
    if (!payload.transactionId) {
      issues.push({ field: "transactionId", messages: ["transactionId is required"] });
    }
    return err(new TemboValidationError(issues));
  }
  return ok(payload);
}

export function isSuccessfulWebhook(payload: WebhookPayload): boolean {
  return payload.statusCode === TEMBO_STATUS.PAYMENT_ACCEPTED;
}

export function isFailedWebhook(payload: WebhookPayload): boolean {
  return (
    payload.statusCode === TEMBO_STATUS.PAYMENT_REJECTED ||
    payload.statusCode === TEMBO_STATUS.GENERIC_ERROR
  );
}
