import { Logger } from "@nestjs/common";
import axios, { AxiosError, AxiosInstance, AxiosResponse } from "axios";
import { FAILED_STATUS_CODES } from "./tembo.constants";
import {
  decodeApiErrorEnvelope,
  decodeCollectionResponse,
  parseJson,
} from "./tembo.codec";
import {
  err,
  ok,
  TemboBusinessError,
  TemboError,
  TemboResult,
  TemboTransportError,
} from "./tembo.errors";
import { generateRequestId } from "./tembo.utils";
import type { CallOptions, CollectionResponse, ResolvedClientConfig } from "./tembo.types";

export type Decoder<T> = (value: unknown) => TemboResult<T>;

/**
 * Authenticated JSON-over-HTTPS dispatch to the gateway.
 *
 * Every reply status is accepted by axios and classified here:
 *   non-2xx  → gateway error envelope (TemboApiError) or TemboTransportError
 *   2xx      → decoded body, or TemboDecodeError
 * Status replies additionally turn PAYMENT_REJECTED / GENERIC_ERROR into
 * TemboBusinessError. Nothing is retried.
 */
export class TemboHttpTransport {
  private readonly logger = new Logger(TemboHttpTransport.name);
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: ResolvedClientConfig,
    private readonly nextRequestId: () => string = generateRequestId,
  ) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
  }

  /** POSTs and decodes the 2xx body with `decode`. */
  async post<T>(
    path: string,
    body: Record<string, unknown> | undefined,
    subject: string,
    decode: Decoder<T>,
    opts: CallOptions = {},
  ): Promise<TemboResult<T>> {
    const requestId = this.nextRequestId();
    const sent = await this.dispatch(path, body, requestId, opts);
    if (!sent.ok) return this.failed(path, requestId, sent.error);

    const { status, raw } = sent.value;
    if (status < 200 || status >= 300) {
      const error =
        decodeApiErrorEnvelope(raw) ??
        new TemboTransportError(
          "status",
          `unexpected status code: ${status}, body: ${raw}`,
          status,
          raw,
        );
      return this.failed(path, requestId, error);
    }

    const parsed = parseJson(subject, raw);
    if (!parsed.ok) return this.failed(path, requestId, parsed.error);

    const decoded = decode(parsed.value);
    if (!decoded.ok) return this.failed(path, requestId, decoded.error);

    this.logger.debug(`[Tembo] ${path} ${status} [${requestId}]`);
    return decoded;
  }

  /**
   * POSTs a call whose reply is a status record (collections, payouts, status
   * queries). A 2xx reply reporting a rejected or failed payment is an error.
   */
  async postForStatus(
    path: string,
    body: Record<string, unknown>,
    opts: CallOptions = {},
  ): Promise<TemboResult<CollectionResponse>> {
    const result = await this.post(path, body, "collection response", decodeCollectionResponse, opts);
    if (!result.ok) return result;

    const response = result.value;
    if (FAILED_STATUS_CODES.has(response.statusCode)) {
      this.logger.warn(
        `[Tembo] ${path} business failure status=${response.statusCode} ref=${response.transactionRef} id=${response.transactionId}`,
      );
      return err(new TemboBusinessError(response.statusCode, response));
    }
    return ok(response);
  }

  private async dispatch(
    path: string,
    body: Record<string, unknown> | undefined,
    requestId: string,
    opts: CallOptions,
  ): Promise<TemboResult<{ status: number; raw: string }>> {
    const { accountId, secretKey } = this.config.credentials;
    this.logger.debug(`[Tembo] POST ${path} [${requestId}]`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(
        path,
        body === undefined ? undefined : JSON.stringify(body),
        {
          headers: {
            "Content-Type": "application/json",
            "x-account-id": accountId,
            "x-secret-key": secretKey,
            "x-request-id": requestId,
          },
          signal: opts.signal,
        },
      );
    } catch (e) {
      return err(this.classifyFailure(e));
    }

    return ok({ status: response.status, raw: rawBody(response.data) });
  }

  private classifyFailure(e: unknown): TemboTransportError {
    if (axios.isCancel(e)) {
      return new TemboTransportError("cancelled", "request cancelled; gateway outcome unknown");
    }
    if (axios.isAxiosError(e)) {
      if (e.code === AxiosError.ECONNABORTED || e.code === AxiosError.ETIMEDOUT) {
        return new TemboTransportError(
          "timeout",
          `request timed out after ${this.config.timeoutMs}ms`,
        );
      }
      return new TemboTransportError("network", `request failed: ${e.message}`);
    }
    const message = e instanceof Error ? e.message : String(e);
    return new TemboTransportError("network", `request failed: ${message}`);
  }

  private failed<T>(path: string, requestId: string, error: TemboError): TemboResult<T> {
    this.logger.warn(`[Tembo] ${path} failed kind=${error.kind} [${requestId}]: ${error.message}`);
    return err(error);
  }
}

function rawBody(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return JSON.stringify(data);
}
