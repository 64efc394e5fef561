import {
  AmbiguousEntitlementsError,
  AuthenticationError,
  EntitlementsError,
  EntitlementsSequenceNotFoundError,
  EntitlementsSetNotFoundError,
  FailedError,
  InsufficientEntitlementsError,
  InvalidArgumentError,
  InvalidTokenError,
  NoBillingGroupError,
  NoEntitlementsError,
  NoExternalIdError,
  PlatformError,
  ServiceError,
  UnknownError,
} from '@entitlements-sdk/shared';
import type { GraphQLServiceError } from '../transport/graphql-transport.interface';
import { GraphQLTransportError } from '../transport/graphql-transport.error';

const MAX_CAUSE_DEPTH = 32;

/** Error name used by the identity provider when a login or token is rejected. */
const NOT_AUTHORIZED_ERROR_NAME = 'NotAuthorizedException';
const ABORT_ERROR_NAME = 'AbortError';

const HTTP_UNAUTHORIZED = 401;
const HTTP_SERVER_ERROR = 500;

/** Matched in order against the `errorType` of a service error; first hit wins. */
const SERVICE_ERROR_TYPES: ReadonlyArray<[string, () => EntitlementsError]> = [
  [
    'AmbiguousEntitlementsError',
    () => new AmbiguousEntitlementsError('Multiple conflicting entitlement sets have been recognized'),
  ],
  ['InvalidArgumentError', () => new InvalidArgumentError('Invalid argument')],
  ['InvalidTokenError', () => new InvalidTokenError('Invalid identity token recognized')],
  ['InsufficientEntitlementsError', () => new InsufficientEntitlementsError('Insufficient entitlements')],
  ['NoEntitlementsError', () => new NoEntitlementsError('No entitlements assigned to user')],
  ['NoExternalIdError', () => new NoExternalIdError('No external ID found for user')],
  ['NoBillingGroupError', () => new NoBillingGroupError('No billing group assigned to user')],
  [
    'EntitlementsSequenceNotFoundError',
    () => new EntitlementsSequenceNotFoundError('Entitlements sequence not found'),
  ],
  ['EntitlementsSetNotFoundError', () => new EntitlementsSetNotFoundError('Entitlements set not found')],
  ['ServiceError', () => new ServiceError('Service error')],
];

/**
 * Map one error from a GraphQL response to the entitlements error it reports.
 * An HTTP status, where the transport provides one, takes priority over the
 * error type.
 */
export function classifyServiceError(error: GraphQLServiceError): EntitlementsError {
  const httpStatus = readHttpStatus(error);
  if (httpStatus === HTTP_UNAUTHORIZED) {
    return new AuthenticationError('Not authorized');
  }
  if (httpStatus !== undefined && httpStatus >= HTTP_SERVER_ERROR) {
    return new FailedError(`Service returned HTTP ${httpStatus}`);
  }

  const errorType = readErrorType(error);
  const match = SERVICE_ERROR_TYPES.find(([marker]) => errorType.includes(marker));
  if (match) {
    return match[1]();
  }

  return new FailedError(JSON.stringify(error));
}

/**
 * Map an error thrown while calling the transport.
 *
 * Walks the `cause` chain looking for, at each link: a platform SDK error
 * (returned as is), a cancellation (returned as is) or an identity provider
 * rejection (wrapped as `AuthenticationError`). Failing that, a transport
 * error anywhere in the chain becomes `FailedError` (`AuthenticationError` on
 * HTTP 401) and anything else `UnknownError`.
 */
export function classifyThrownError(error: unknown): Error {
  const seen = new Set<Error>();
  let transportError: GraphQLTransportError | undefined;
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current) && seen.size < MAX_CAUSE_DEPTH) {
    seen.add(current);

    if (current instanceof PlatformError || isCancellation(current)) {
      return current;
    }
    if (current.name === NOT_AUTHORIZED_ERROR_NAME) {
      return new AuthenticationError(current.message || 'Not authorized', { cause: current });
    }
    if (!transportError && current instanceof GraphQLTransportError) {
      transportError = current;
    }

    current = current.cause;
  }

  if (transportError) {
    return transportError.status === HTTP_UNAUTHORIZED
      ? new AuthenticationError(transportError.message, { cause: transportError })
      : new FailedError(transportError.message, { cause: transportError });
  }

  return new UnknownError(error);
}

export function isCancellation(error: unknown): boolean {
  return error instanceof Error && error.name === ABORT_ERROR_NAME;
}

function readHttpStatus(error: GraphQLServiceError): number | undefined {
  if (typeof error.httpStatus === 'number') {
    return error.httpStatus;
  }
  const fromExtensions = error.extensions?.httpStatus;
  return typeof fromExtensions === 'number' ? fromExtensions : undefined;
}

function readErrorType(error: GraphQLServiceError): string {
  if (typeof error.errorType === 'string') {
    return error.errorType;
  }
  const fromExtensions = error.extensions?.errorType;
  return typeof fromExtensions === 'string' ? fromExtensions : '';
}
