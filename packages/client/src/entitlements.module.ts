import 'reflect-metadata';
import { DynamicModule, LoggerService, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { SessionProvider } from './auth/session-provider.interface';
import { parseEntitlementsEnv, toClientConfig } from './config/env.schema';
import { createEntitlementsClient } from './entitlements-client.builder';
import type { EntitlementsClient } from './entitlements.client';
import type { GraphQLTransport } from './transport/graphql-transport.interface';

export const ENTITLEMENTS_CLIENT = 'ENTITLEMENTS_CLIENT';

export interface EntitlementsModuleOptions {
  sessionProvider: SessionProvider;
  transport?: GraphQLTransport;
  logger?: LoggerService;
}

@Module({})
export class EntitlementsModule {
  /**
   * Provide an `EntitlementsClient` under `ENTITLEMENTS_CLIENT`. Without a
   * `transport`, the endpoint and timeout come from `ConfigService`.
   */
  static register(options: EntitlementsModuleOptions): DynamicModule {
    return {
      module: EntitlementsModule,
      imports: [ConfigModule],
      providers: [
        {
          provide: ENTITLEMENTS_CLIENT,
          useFactory: (configService: ConfigService): EntitlementsClient => {
            const config = options.transport
              ? undefined
              : toClientConfig(
                  parseEntitlementsEnv({
                    ENTITLEMENTS_API_URL: configService.get<string>('ENTITLEMENTS_API_URL'),
                    ENTITLEMENTS_TIMEOUT_MS: configService.get<string>('ENTITLEMENTS_TIMEOUT_MS'),
                  }),
                );
            return createEntitlementsClient({ ...options, config });
          },
          inject: [ConfigService],
        },
      ],
      exports: [ENTITLEMENTS_CLIENT],
    };
  }
}
