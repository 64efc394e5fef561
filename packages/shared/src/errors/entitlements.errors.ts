import { PlatformError } from './platform.error';

export type EntitlementsErrorKind =
  | 'AmbiguousEntitlements'
  | 'Authentication'
  | 'Failed'
  | 'InsufficientEntitlements'
  | 'InvalidArgument'
  | 'InvalidToken'
  | 'NoEntitlements'
  | 'NoExternalId'
  | 'NoBillingGroup'
  | 'EntitlementsSequenceNotFound'
  | 'EntitlementsSetNotFound'
  | 'Service'
  | 'NotSignedIn'
  | 'Unknown';

/**
 * Errors raised by the entitlements client. Callers narrow on `kind`.
 */
export abstract class EntitlementsError extends PlatformError {
  abstract readonly kind: EntitlementsErrorKind;
}

/** Multiple conflicting entitlements sets matched the user's identity claims. */
export class AmbiguousEntitlementsError extends EntitlementsError {
  readonly kind = 'AmbiguousEntitlements' as const;
}

export class AuthenticationError extends EntitlementsError {
  readonly kind = 'Authentication' as const;
}

/** The request failed and no more specific reason could be determined. */
export class FailedError extends EntitlementsError {
  readonly kind = 'Failed' as const;
}

/** The user is not entitled to consume the requested entitlement. */
export class InsufficientEntitlementsError extends EntitlementsError {
  readonly kind = 'InsufficientEntitlements' as const;
}

export class InvalidArgumentError extends EntitlementsError {
  readonly kind = 'InvalidArgument' as const;
}

/** Legacy: the identity token presented for redemption was rejected. */
export class InvalidTokenError extends EntitlementsError {
  readonly kind = 'InvalidToken' as const;
}

export class NoEntitlementsError extends EntitlementsError {
  readonly kind = 'NoEntitlements' as const;
}

export class NoExternalIdError extends EntitlementsError {
  readonly kind = 'NoExternalId' as const;
}

export class NoBillingGroupError extends EntitlementsError {
  readonly kind = 'NoBillingGroup' as const;
}

export class EntitlementsSequenceNotFoundError extends EntitlementsError {
  readonly kind = 'EntitlementsSequenceNotFound' as const;
}

export class EntitlementsSetNotFoundError extends EntitlementsError {
  readonly kind = 'EntitlementsSetNotFound' as const;
}

export class ServiceError extends EntitlementsError {
  readonly kind = 'Service' as const;
}

export class NotSignedInError extends EntitlementsError {
  readonly kind = 'NotSignedIn' as const;

  constructor(message = 'Not signed in', options?: ErrorOptions) {
    super(message, options);
  }
}

/** Wraps an error that could not be recognized. The original is always the `cause`. */
export class UnknownError extends EntitlementsError {
  readonly kind = 'Unknown' as const;

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
  }
}

export type AnyEntitlementsError =
  | AmbiguousEntitlementsError
  | AuthenticationError
  | FailedError
  | InsufficientEntitlementsError
  | InvalidArgumentError
  | InvalidTokenError
  | NoEntitlementsError
  | NoExternalIdError
  | NoBillingGroupError
  | EntitlementsSequenceNotFoundError
  | EntitlementsSetNotFoundError
  | ServiceError
  | NotSignedInError
  | UnknownError;

const ERROR_CLASSES = [
  AmbiguousEntitlementsError,
  AuthenticationError,
  FailedError,
  InsufficientEntitlementsError,
  InvalidArgumentError,
  InvalidTokenError,
  NoEntitlementsError,
  NoExternalIdError,
  NoBillingGroupError,
  EntitlementsSequenceNotFoundError,
  EntitlementsSetNotFoundError,
  ServiceError,
  NotSignedInError,
  UnknownError,
];

export function isEntitlementsError(error: unknown): error is AnyEntitlementsError {
  return ERROR_CLASSES.some((errorClass) => error instanceof errorClass);
}
