import "reflect-metadata";
import * as dotenv from "dotenv";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import {
  buildCollectionRequest,
  getChannelProvider,
  TEMBO_STATUS,
  TemboClient,
  TemboModule,
  validateMsisdn,
} from "../src";

dotenv.config();

// ─── usage ────────────────────────────────────────────────────────────────────
//   npm run demo -- <phone> <channel> <amount> [callbackUrl]
//   npm run demo -- 0712345678 TZ-TIGO-C2B 1000

const POLL_ATTEMPTS = 10;
const POLL_INTERVAL_MS = 3_000;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function main() {
  const [phone, channel, amountArg, callbackUrl = "https://example.com/webhooks/tembo"] =
    process.argv.slice(2);
  if (!phone || !channel || !amountArg) {
    throw new Error("usage: collect-demo <phone> <channel> <amount> [callbackUrl]");
  }

  const app = await NestFactory.createApplicationContext(
    TemboModule.forRootFromEnv({ ignoreEnvFile: true }),
    { logger: ["log", "warn", "error"] },
  );
  const client = app.get(TemboClient);

  try {
    const req = buildCollectionRequest(phone, channel, Number(amountArg), "Demo collection", callbackUrl);
    const msisdn = validateMsisdn(req.msisdn);
    if (!msisdn.ok) throw msisdn.error;

    Logger.log(`Collecting ${req.amount} TZS via ${getChannelProvider(channel)} from ${req.msisdn}`, "Demo");
    const started = await client.collectFromMobileMoney(req);
    if (!started.ok) throw started.error;
    Logger.log(`Accepted: ref=${started.value.transactionRef} id=${started.value.transactionId}`, "Demo");

    // ─── poll until the subscriber approves or declines ───
    for (let attempt = 1; attempt <= POLL_ATTEMPTS; attempt++) {
      await sleep(POLL_INTERVAL_MS);
      const status = await client.getCollectionStatus({ transactionRef: req.transactionRef });
      if (!status.ok) {
        Logger.warn(`Attempt ${attempt}: ${status.error.message}`, "Demo");
        if (status.error.kind === "business") return;
        continue;
      }
      Logger.log(`Attempt ${attempt}: ${status.value.statusCode}`, "Demo");
      if (status.value.statusCode === TEMBO_STATUS.PAYMENT_ACCEPTED) return;
    }
    Logger.warn(`No final status after ${POLL_ATTEMPTS} attempts`, "Demo");
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.message : String(error), "Demo");
  process.exitCode = 1;
});
