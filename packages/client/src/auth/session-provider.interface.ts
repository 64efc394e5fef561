/**
 * Authenticated session of the signed in user, supplied by the identity client.
 */
export interface SessionProvider {
  isSignedIn(): Promise<boolean>;

  /** Token sent in the `Authorization` header of every request. */
  getAuthorizationToken(): Promise<string>;
}
