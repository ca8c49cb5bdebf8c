import "reflect-metadata";
import { Injectable } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import { TemboClient } from "./tembo.client";
import { TemboModule } from "./tembo.module";
import { TemboWebhookController } from "./tembo-webhook.controller";
import { fakeGateway } from "./testing/fake-gateway";
import type { TemboWebhookHandler, WebhookPayload } from "./tembo.types";

@Injectable()
class RecordingHandler implements TemboWebhookHandler {
  readonly seen: WebhookPayload[] = [];

  async handle(payload: WebhookPayload): Promise<void> {
    this.seen.push(payload);
  }
}

describe("TemboModule", () => {
  const ENV_KEYS = ["TEMBO_ENVIRONMENT", "TEMBO_ACCOUNT_ID", "TEMBO_SECRET_KEY", "TEMBO_TIMEOUT_MS", "TEMBO_BASE_URL"];
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) saved[key] = process.env[key];
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (saved[key] === undefined) delete process.env[key];
      else process.env[key] = saved[key];
    }
  });

  it("provides a configured client from static options", async () => {
    const gateway = fakeGateway({
      status: 200,
      body: { statusCode: "PENDING_ACK", transactionRef: "TXN_1", transactionId: "TMB-1" },
    });
    const moduleRef = await Test.createTestingModule({
      imports: [
        TemboModule.forRoot({
          environment: "production",
          accountId: "test-account",
          secretKey: "test-secret",
          adapter: gateway.adapter,
        }),
      ],
    }).compile();

    const client = moduleRef.get(TemboClient);
    expect(client.config.baseUrl).toBe("https://api.temboplus.com");

    const result = await client.getPaymentStatus({ transactionRef: "TXN_1" });
    expect(result.ok).toBe(true);
    expect(gateway.calls[0].url).toBe("/tembo/v1/payment/status");
  });

  it("does not register the webhook endpoint without a handler", async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        TemboModule.forRoot({ environment: "sandbox", accountId: "test-account", secretKey: "test-secret" }),
      ],
    }).compile();

    expect(() => moduleRef.get(TemboWebhookController)).toThrow();
  });

  it("wires the webhook controller to the supplied handler", async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        TemboModule.forRoot({
          environment: "sandbox",
          accountId: "test-account",
          secretKey: "test-secret",
          webhookHandler: RecordingHandler,
        }),
      ],
    }).compile();

    expect(moduleRef.get(TemboWebhookController)).toBeInstanceOf(TemboWebhookController);
  });

  it("reads the client configuration from TEMBO_* variables", async () => {
    process.env.TEMBO_ENVIRONMENT = "sandbox";
    process.env.TEMBO_ACCOUNT_ID = "env-account";
    process.env.TEMBO_SECRET_KEY = "test-secret";
    process.env.TEMBO_TIMEOUT_MS = "15000";
    process.env.TEMBO_BASE_URL = "http://localhost:4010";

    const moduleRef = await Test.createTestingModule({
      imports: [TemboModule.forRootFromEnv({ ignoreEnvFile: true })],
    }).compile();

    const client = moduleRef.get(TemboClient);
    expect(client.config.environment).toBe("sandbox");
    expect(client.config.baseUrl).toBe("http://localhost:4010");
    expect(client.config.timeoutMs).toBe(15_000);
    expect(client.config.credentials.accountId).toBe("env-account");
  });
});
