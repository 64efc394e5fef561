import type { LoggerService } from '@nestjs/common';
import type { SessionProvider } from './auth/session-provider.interface';
import type { EntitlementsClientConfig } from './config/env.schema';
import { DefaultEntitlementsClient, EntitlementsClient } from './entitlements.client';
import type { GraphQLTransport } from './transport/graphql-transport.interface';
import { HttpGraphQLTransport } from './transport/http-graphql.transport';

export interface EntitlementsClientOptions {
  sessionProvider: SessionProvider;
  /** Required unless a `transport` is supplied. */
  config?: EntitlementsClientConfig;
  transport?: GraphQLTransport;
  logger?: LoggerService;
}

export class EntitlementsClientBuilder {
  private config?: EntitlementsClientConfig;
  private sessionProvider?: SessionProvider;
  private transport?: GraphQLTransport;
  private logger?: LoggerService;

  setConfig(config: EntitlementsClientConfig): this {
    this.config = config;
    return this;
  }

  setSessionProvider(sessionProvider: SessionProvider): this {
    this.sessionProvider = sessionProvider;
    return this;
  }

  /** Replaces the default HTTP transport. */
  setTransport(transport: GraphQLTransport): this {
    this.transport = transport;
    return this;
  }

  setLogger(logger: LoggerService): this {
    this.logger = logger;
    return this;
  }

  build(): EntitlementsClient {
    const sessionProvider = this.sessionProvider;
    if (!sessionProvider) {
      throw new Error('SessionProvider must be provided.');
    }

    let transport = this.transport;
    if (!transport) {
      if (!this.config) {
        throw new Error('Config must be provided when no transport is supplied.');
      }
      transport = new HttpGraphQLTransport({
        config: this.config,
        sessionProvider,
        logger: this.logger,
      });
    }

    return new DefaultEntitlementsClient(sessionProvider, transport, this.logger);
  }
}

export function createEntitlementsClient(options: EntitlementsClientOptions): EntitlementsClient {
  const builder = new EntitlementsClientBuilder().setSessionProvider(options.sessionProvider);
  if (options.config) {
    builder.setConfig(options.config);
  }
  if (options.transport) {
    builder.setTransport(options.transport);
  }
  if (options.logger) {
    builder.setLogger(options.logger);
  }
  return builder.build();
}
