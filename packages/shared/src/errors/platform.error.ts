/**
 * Base class for the error taxonomies of every SDK on the platform.
 *
 * Identity, entitlements and any other platform client derive their errors
 * from this class, so an error raised by one SDK can cross another unchanged.
 */
export abstract class PlatformError extends Error {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}
