import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from "class-validator";
import { Transform } from "class-transformer";
import { DEFAULT_TIMEOUT_MS, TemboEnvironment } from "../tembo/tembo.constants";

export class TemboEnvironmentVariables {
  @IsIn(["sandbox", "production"])
  TEMBO_ENVIRONMENT: TemboEnvironment = "sandbox";

  /** Sent as x-account-id. */
  @IsString()
  @IsNotEmpty()
  TEMBO_ACCOUNT_ID!: string;

  /** Sent as x-secret-key. */
  @IsString()
  @IsNotEmpty()
  TEMBO_SECRET_KEY!: string;

  @Transform(({ value }) => (typeof value === "string" ? parseInt(value, 10) : value))
  @IsInt()
  @Min(1)
  @Max(300_000)
  TEMBO_TIMEOUT_MS: number = DEFAULT_TIMEOUT_MS;

  /** Overrides the environment host (mock servers, proxies). */
  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true })
  TEMBO_BASE_URL?: string;
}
