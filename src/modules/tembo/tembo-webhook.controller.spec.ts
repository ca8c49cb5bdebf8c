import type { Request, Response } from "express";
import type { RawBodyRequest } from "@nestjs/common";
import { TemboWebhookController } from "./tembo-webhook.controller";
import type { TemboWebhookHandler, WebhookPayload } from "./tembo.types";

// ── helpers ──────────────────────────────────────────────────────────────────

function makeRes() {
  const res = {
    statusCode: 0,
    payload: undefined as unknown,
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockImplementation((code: number) => {
    res.statusCode = code;
    return res;
  });
  res.json.mockImplementation((body: unknown) => {
    res.payload = body;
    return res;
  });
  return res;
}

function makeReq(rawBody: string | undefined, body: unknown = undefined) {
  return {
    rawBody: rawBody === undefined ? undefined : Buffer.from(rawBody),
    body,
  } as unknown as RawBodyRequest<Request>;
}

function makeHandler(impl?: (p: WebhookPayload) => Promise<void>) {
  const handle = jest.fn(async (p: WebhookPayload): Promise<void> => {
    if (impl) await impl(p);
  });
  const handler: TemboWebhookHandler = { handle };
  return { handler, handle };
}

const ACCEPTED = JSON.stringify({
  statusCode: "PAYMENT_ACCEPTED",
  transactionRef: "TXN_1001",
  transactionId: "TMB-1",
});

// ── tests ─────────────────────────────────────────────────────────────────────

describe("TemboWebhookController", () => {
  it("hands a valid callback to the handler and acknowledges it", async () => {
    const { handler, handle } = makeHandler();
    const controller = new TemboWebhookController(handler);
    const res = makeRes();

    await controller.callback(makeReq(ACCEPTED), res as unknown as Response);

    expect(handle).toHaveBeenCalledWith({
      statusCode: "PAYMENT_ACCEPTED",
      transactionRef: "TXN_1001",
      transactionId: "TMB-1",
    });
    expect(res.statusCode).toBe(200);
    expect(res.payload).toEqual({ status: "accepted" });
  });

  it("falls back to the parsed body when no raw body is available", async () => {
    const { handler, handle } = makeHandler();
    const controller = new TemboWebhookController(handler);
    const res = makeRes();

    await controller.callback(makeReq(undefined, JSON.parse(ACCEPTED)), res as unknown as Response);

    expect(handle).toHaveBeenCalledTimes(1);
    expect(res.statusCode).toBe(200);
  });

  it("rejects an invalid payload so the gateway redelivers", async () => {
    const { handler, handle } = makeHandler();
    const controller = new TemboWebhookController(handler);
    const res = makeRes();

    await controller.callback(
      makeReq(JSON.stringify({ statusCode: "PAYMENT_ACCEPTED", transactionRef: "TXN_1001" })),
      res as unknown as Response,
    );

    expect(handle).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(400);
    expect(res.payload).toEqual({
      status: "rejected",
      reason: "Tembo validation failed: transactionId (transactionId is required)",
    });
  });

  it("rejects malformed JSON", async () => {
    const { handler } = makeHandler();
    const controller = new TemboWebhookController(handler);
    const res = makeRes();

    await controller.callback(makeReq("{oops"), res as unknown as Response);

    expect(res.statusCode).toBe(400);
  });

  it("answers 500 when the handler fails instead of swallowing the error", async () => {
    const { handler } = makeHandler(async () => {
      throw new Error("ledger unavailable");
    });
    const controller = new TemboWebhookController(handler);
    const res = makeRes();

    await controller.callback(makeReq(ACCEPTED), res as unknown as Response);

    expect(res.statusCode).toBe(500);
    expect(res.payload).toEqual({ status: "rejected", reason: "ledger unavailable" });
  });
});
