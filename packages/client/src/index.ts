export * from './auth/session-provider.interface';
export * from './config/env.schema';
export * from './errors/error-classifier';
export * from './graphql/operations';
export * from './transformers/entitlements.transformer';
export * from './transport/graphql-transport.interface';
export * from './transport/graphql-transport.error';
export * from './transport/http-graphql.transport';
export * from './entitlements.client';
export * from './entitlements-client.builder';
export * from './entitlements.module';
