export { TemboConfigModule, clientConfigFromEnv, validateTemboEnv } from "./config.module";
export type { TemboConfigOptions } from "./config.module";
export { TemboEnvironmentVariables } from "./env.validation";
