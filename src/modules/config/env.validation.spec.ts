import "reflect-metadata";
import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { ConfigService } from "@nestjs/config";
import { TemboEnvironmentVariables } from "./env.validation";
import { clientConfigFromEnv, validateTemboEnv } from "./config.module";

function validate(input: Record<string, unknown>) {
  const instance = plainToInstance(TemboEnvironmentVariables, input, {
    enableImplicitConversion: true,
  });
  return validateSync(instance, { skipMissingProperties: false });
}

const VALID_BASE = {
  TEMBO_ENVIRONMENT: "sandbox",
  TEMBO_ACCOUNT_ID: "test-account",
  TEMBO_SECRET_KEY: "test-secret",
};

describe("TemboEnvironmentVariables validation", () => {
  it("passes with all required vars present", () => {
    expect(validate(VALID_BASE)).toHaveLength(0);
  });

  it("defaults to the sandbox with a 30s timeout", () => {
    const { TEMBO_ENVIRONMENT: _, ...rest } = VALID_BASE;
    const validated = validateTemboEnv(rest);
    expect(validated.TEMBO_ENVIRONMENT).toBe("sandbox");
    expect(validated.TEMBO_TIMEOUT_MS).toBe(30_000);
  });

  it("fails when TEMBO_ACCOUNT_ID is missing", () => {
    const { TEMBO_ACCOUNT_ID: _, ...rest } = VALID_BASE;
    const errors = validate(rest);
    expect(errors.some((e) => e.property === "TEMBO_ACCOUNT_ID")).toBe(true);
  });

  it("fails when TEMBO_SECRET_KEY is empty", () => {
    const errors = validate({ ...VALID_BASE, TEMBO_SECRET_KEY: "" });
    expect(errors.some((e) => e.property === "TEMBO_SECRET_KEY")).toBe(true);
  });

  it("fails when TEMBO_ENVIRONMENT is an invalid value", () => {
    const errors = validate({ ...VALID_BASE, TEMBO_ENVIRONMENT: "staging" });
    expect(errors.some((e) => e.property === "TEMBO_ENVIRONMENT")).toBe(true);
  });

  it("parses TEMBO_TIMEOUT_MS and bounds it", () => {
    expect(validateTemboEnv({ ...VALID_BASE, TEMBO_TIMEOUT_MS: "5000" }).TEMBO_TIMEOUT_MS).toBe(5000);
    const errors = validate({ ...VALID_BASE, TEMBO_TIMEOUT_MS: "0" });
    expect(errors.some((e) => e.property === "TEMBO_TIMEOUT_MS")).toBe(true);
  });

  it("accepts a local TEMBO_BASE_URL and rejects a bare host", () => {
    expect(validate({ ...VALID_BASE, TEMBO_BASE_URL: "http://localhost:4010" })).toHaveLength(0);
    const errors = validate({ ...VALID_BASE, TEMBO_BASE_URL: "sandbox.temboplus.com" });
    expect(errors.some((e) => e.property === "TEMBO_BASE_URL")).toBe(true);
  });

  it("throws a readable error from validateTemboEnv", () => {
    expect(() => validateTemboEnv({ TEMBO_ACCOUNT_ID: "test-account" })).toThrow(
      /^Environment validation failed:/,
    );
  });
});

describe("clientConfigFromEnv", () => {
  it("maps validated variables onto a client config", () => {
    const validated = validateTemboEnv({
      ...VALID_BASE,
      TEMBO_ENVIRONMENT: "production",
      TEMBO_TIMEOUT_MS: "10000",
    });
    const config = {
      get: (key: string) => Reflect.get(validated, key),
      getOrThrow: (key: string) => Reflect.get(validated, key),
    } as unknown as ConfigService;

    expect(clientConfigFromEnv(config)).toEqual({
      environment: "production",
      accountId: "test-account",
      secretKey: "test-secret",
      timeoutMs: 10_000,
      baseUrl: undefined,
    });
  });
});
