import { TemboDecodeError, TemboValidationError } from "./tembo.errors";
import { isFailedWebhook, isSuccessfulWebhook, parseWebhook } from "./tembo-webhook.validator";

const ACCEPTED = {
  statusCode: "PAYMENT_ACCEPTED",
  transactionRef: "TXN_1001",
  transactionId: "TMB-1",
};

describe("parseWebhook", () => {
  it("parses a string body", () => {
    expect(parseWebhook(JSON.stringify(ACCEPTED))).toEqual({ ok: true, value: ACCEPTED });
  });

  it("parses a raw Buffer body", () => {
    expect(parseWebhook(Buffer.from(JSON.stringify(ACCEPTED)))).toEqual({ ok: true, value: ACCEPTED });
  });

  it("ignores fields outside the payload shape", () => {
    const result = parseWebhook(JSON.stringify({ ...ACCEPTED, extra: "ignored" }));
    expect(result).toEqual({ ok: true, value: ACCEPTED });
  });

  it("rejects invalid JSON as a decode error", () => {
    const result = parseWebhook("statusCode=PAYMENT_ACCEPTED");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TemboDecodeError);
  });

  it("rejects a body of the wrong shape as a decode error", () => {
    const result = parseWebhook(JSON.stringify({ ...ACCEPTED, transactionId: 42 }));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TemboDecodeError);
  });

  it("rejects missing identifiers as a validation error", () => {
    const result = parseWebhook(JSON.stringify({ statusCode: "PAYMENT_ACCEPTED", transactionRef: "TXN_1" }));
    expect(result.ok).toBe(false);
    if (result.ok || !(result.error instanceof TemboValidationError)) return;
    expect(result.error.issues).toEqual([
      { field: "transactionId", messages: ["transactionId is required"] },
    ]);
  });

  it("rejects an empty transaction reference", () => {
    const result = parseWebhook(JSON.stringify({ ...ACCEPTED, transactionRef: "" }));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("validation");
  });
});

describe("webhook classification", () => {
  it("recognises a successful payment", () => {
    expect(isSuccessfulWebhook(ACCEPTED)).toBe(true);
    expect(isFailedWebhook(ACCEPTED)).toBe(false);
  });

  it.each(["PAYMENT_REJECTED", "GENERIC_ERROR"])("recognises %s as failed", (statusCode) => {
    const payload = { ...ACCEPTED, statusCode };
    expect(isFailedWebhook(payload)).toBe(true);
    expect(isSuccessfulWebhook(payload)).toBe(false);
  });

  it("treats a pending acknowledgement as neither", () => {
    const payload = { ...ACCEPTED, statusCode: "PENDING_ACK" };
    expect(isSuccessfulWebhook(payload)).toBe(false);
    expect(isFailedWebhook(payload)).toBe(false);
  });
});
