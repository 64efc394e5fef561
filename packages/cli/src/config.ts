import {
  EntitlementsClient,
  createEntitlementsClient,
  parseEntitlementsEnv,
  toClientConfig,
} from '@entitlements-sdk/client';
import { CliLogger } from './logger';
import { StaticTokenSessionProvider } from './session';

export interface CliClientOptions {
  verbose?: boolean;
}

/**
 * Build a client from `ENTITLEMENTS_*` environment variables.
 */
export function createCliClient(
  env: Record<string, string | undefined>,
  options: CliClientOptions = {},
): EntitlementsClient {
  const parsed = parseEntitlementsEnv(env);

  return createEntitlementsClient({
    sessionProvider: new StaticTokenSessionProvider(parsed.ENTITLEMENTS_ID_TOKEN),
    config: toClientConfig(parsed),
    logger: new CliLogger(options.verbose),
  });
}
