import { DynamicModule, Module } from "@nestjs/common";
import { ConfigModule as NestConfigModule, ConfigService } from "@nestjs/config";
import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import type { ClientConfig } from "../tembo/tembo.types";
import { TemboEnvironmentVariables } from "./env.validation";

export function validateTemboEnv(config: Record<string, unknown>) {
  const validated = plainToInstance(TemboEnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, {
    skipMissingProperties: false,
  });
  if (errors.length > 0) {
    throw new Error(
      `Environment validation failed:\n${errors
        .map((e) => Object.values(e.constraints ?? {}).join(", "))
        .join("\n")}`,
    );
  }
  return validated;
}

/** Maps validated TEMBO_* variables onto a client configuration. */
export function clientConfigFromEnv(config: ConfigService): ClientConfig {
  return {
    environment: config.getOrThrow<TemboEnvironmentVariables["TEMBO_ENVIRONMENT"]>("TEMBO_ENVIRONMENT"),
    accountId: config.getOrThrow<string>("TEMBO_ACCOUNT_ID"),
    secretKey: config.getOrThrow<string>("TEMBO_SECRET_KEY"),
    timeoutMs: config.getOrThrow<number>("TEMBO_TIMEOUT_MS"),
    baseUrl: config.get<string>("TEMBO_BASE_URL"),
  };
}

export interface TemboConfigOptions {
  /** Skip reading .env; only process.env is used. */
  ignoreEnvFile?: boolean;
  envFilePath?: string;
}

@Module({})
export class TemboConfigModule {
  static forRoot(options: TemboConfigOptions = {}): DynamicModule {
    return {
      module: TemboConfigModule,
      imports: [
        NestConfigModule.forRoot({
          ignoreEnvFile: options.ignoreEnvFile,
          envFilePath: options.envFilePath,
          validate: validateTemboEnv,
        }),
      ],
      exports: [NestConfigModule],
    };
  }
}
