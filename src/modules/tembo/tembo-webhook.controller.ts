import {
  Controller,
  HttpCode,
  Inject,
  Logger,
  Post,
  RawBodyRequest,
  Req,
  Res,
} from "@nestjs/common";
import type { Request, Response } from "express";
import { TEMBO_WEBHOOK_HANDLER } from "./tembo.constants";
import type { TemboWebhookHandler } from "./tembo.types";
import { isFailedWebhook, isSuccessfulWebhook, parseWebhook } from "./tembo-webhook.validator";

/**
 * POST /webhooks/tembo: gateway payment callbacks.
 *
 * Anything other than a 200 makes the gateway redeliver, so payloads that
 * fail validation and handler errors are both answered with a rejection.
 */
@Controller("webhooks/tembo")
export class TemboWebhookController {
  private readonly logger = new Logger(TemboWebhookController.name);

  constructor(
    @Inject(TEMBO_WEBHOOK_HANDLER) private readonly handler: TemboWebhookHandler,
  ) {}

  @Post()
  @HttpCode(200)
  async callback(@Req() req: RawBodyRequest<Request>, @Res() res: Response) {
    const rawBody = this.extractRawBody(req);
    const parsed = parseWebhook(rawBody);

    if (!parsed.ok) {
      this.logger.warn(`[webhook] Rejected kind=${parsed.error.kind}: ${parsed.error.message}`);
      return res.status(400).json({ status: "rejected", reason: parsed.error.message });
    }

    const payload = parsed.value;
    const outcome = isSuccessfulWebhook(payload)
      ? "accepted"
      : isFailedWebhook(payload)
        ? "failed"
        : "pending";
    this.logger.log(
      `[webhook] status=${payload.statusCode} outcome=${outcome} ref=${payload.transactionRef} id=${payload.transactionId}`,
    );

    try {
      await this.handler.handle(payload);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      this.logger.error(`[webhook] Handler failed ref=${payload.transactionRef}: ${reason}`);
      return res.status(500).json({ status: "rejected", reason });
    }

    return res.status(200).json({ status: "accepted" });
  }

  private extractRawBody(req: RawBodyRequest<Request>): string | Buffer {
    if (req.rawBody) return req.rawBody;
    const body: unknown = req.body;
    if (typeof body === "string" || Buffer.isBuffer(body)) return body;
    return JSON.stringify(body ?? {});
  }
}
