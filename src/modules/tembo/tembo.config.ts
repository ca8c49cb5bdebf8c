import {
  BASE_URLS,
  DEFAULT_ENDPOINTS,
  DEFAULT_TIMEOUT_MS,
  TemboEnvironment,
} from "./tembo.constants";
import type { ClientConfig, ResolvedClientConfig } from "./tembo.types";

const ENVIRONMENTS: readonly TemboEnvironment[] = ["sandbox", "production"];

/**
 * Applies defaults and freezes the result. Misconfiguration throws here, at
 * construction, rather than surfacing on the first gateway call.
 */
export function resolveClientConfig(config: ClientConfig): ResolvedClientConfig {
  if (!ENVIRONMENTS.includes(config.environment)) {
    throw new Error(`Tembo client: unknown environment "${config.environment}"`);
  }
  if (!config.accountId) {
    throw new Error("Tembo client: accountId is required");
  }
  if (!config.secretKey) {
    throw new Error("Tembo client: secretKey is required");
  }

  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`Tembo client: timeoutMs must be positive, got ${timeoutMs}`);
  }

  const baseUrl = (config.baseUrl ?? BASE_URLS[config.environment]).replace(/\/+$/, "");

  return Object.freeze({
    environment: config.environment,
    baseUrl,
    credentials: Object.freeze({
      accountId: config.accountId,
      secretKey: config.secretKey,
    }),
    timeoutMs,
    endpoints: Object.freeze({ ...DEFAULT_ENDPOINTS, ...config.endpoints }),
    adapter: config.adapter,
  });
}
