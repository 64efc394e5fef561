export * from './types/entitlements';
export * from './errors/platform.error';
export * from './errors/entitlements.errors';
export * from './utils/version';
