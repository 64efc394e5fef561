import { z } from 'zod';

export const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Environment variables read by the entitlements client and CLI.
 */
export const entitlementsEnvSchema = z.object({
  ENTITLEMENTS_API_URL: z.string().url(),
  ENTITLEMENTS_TIMEOUT_MS: z.coerce.number().int().min(1000).max(60000).default(DEFAULT_TIMEOUT_MS),

  // Used by the CLI in place of a signed in identity client
  ENTITLEMENTS_ID_TOKEN: z.string().optional(),
});

export type EntitlementsEnv = z.infer<typeof entitlementsEnvSchema>;

export interface EntitlementsClientConfig {
  /** GraphQL endpoint of the entitlements service. */
  apiUrl: string;
  timeoutMs: number;
}

/**
 * Validate the environment, throwing one error that lists every issue.
 */
export function parseEntitlementsEnv(env: Record<string, string | undefined>): EntitlementsEnv {
  const result = entitlementsEnvSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Entitlements configuration is invalid: ${issues.join('; ')}`);
  }

  return result.data;
}

export function toClientConfig(env: EntitlementsEnv): EntitlementsClientConfig {
  return {
    apiUrl: env.ENTITLEMENTS_API_URL,
    timeoutMs: env.ENTITLEMENTS_TIMEOUT_MS,
  };
}
