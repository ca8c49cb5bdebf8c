import { DynamicModule, Module, Provider, Type } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { clientConfigFromEnv, TemboConfigModule, TemboConfigOptions } from "../config";
import { TEMBO_CLIENT_CONFIG, TEMBO_WEBHOOK_HANDLER } from "./tembo.constants";
import { TemboClient } from "./tembo.client";
import { TemboWebhookController } from "./tembo-webhook.controller";
import type { ClientConfig, TemboWebhookHandler } from "./tembo.types";

export interface TemboWebhookOptions {
  /** Registers POST /webhooks/tembo and routes valid callbacks to this class. */
  webhookHandler?: Type<TemboWebhookHandler>;
}

export type TemboModuleOptions = ClientConfig & TemboWebhookOptions;

function webhookParts(handler?: Type<TemboWebhookHandler>) {
  const providers: Provider[] = handler
    ? [{ provide: TEMBO_WEBHOOK_HANDLER, useClass: handler }]
    : [];
  const controllers = handler ? [TemboWebhookController] : [];
  return { providers, controllers };
}

@Module({})
export class TemboModule {
  /** Static configuration. */
  static forRoot(options: TemboModuleOptions): DynamicModule {
    const { webhookHandler, ...config } = options;
    const webhook = webhookParts(webhookHandler);
    return {
      module: TemboModule,
      controllers: webhook.controllers,
      providers: [
        { provide: TEMBO_CLIENT_CONFIG, useValue: config },
        TemboClient,
        ...webhook.providers,
      ],
      exports: [TemboClient],
    };
  }

  /** Configuration from validated TEMBO_* environment variables. */
  static forRootFromEnv(
    options: TemboWebhookOptions & TemboConfigOptions = {},
  ): DynamicModule {
    const { webhookHandler, ...configOptions } = options;
    const webhook = webhookParts(webhookHandler);
    return {
      module: TemboModule,
      imports: [TemboConfigModule.forRoot(configOptions)],
      controllers: webhook.controllers,
      providers: [
        {
          provide: TEMBO_CLIENT_CONFIG,
          inject: [ConfigService],
          useFactory: clientConfigFromEnv,
        },
        TemboClient,
        ...webhook.providers,
      ],
      exports: [TemboClient],
    };
  }
}
