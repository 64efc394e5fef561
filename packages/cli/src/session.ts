import { NotSignedInError } from '@entitlements-sdk/shared';
import type { SessionProvider } from '@entitlements-sdk/client';

/**
 * Session backed by an identity token handed to the CLI, in place of an
 * interactive sign in.
 */
export class StaticTokenSessionProvider implements SessionProvider {
  constructor(private readonly token?: string) {}

  async isSignedIn(): Promise<boolean> {
    return !!this.token;
  }

  async getAuthorizationToken(): Promise<string> {
    if (!this.token) {
      throw new NotSignedInError();
    }
    return this.token;
  }
}
