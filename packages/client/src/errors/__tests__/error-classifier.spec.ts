import {
  AmbiguousEntitlementsError,
  AuthenticationError,
  EntitlementsSequenceNotFoundError,
  EntitlementsSetNotFoundError,
  FailedError,
  InsufficientEntitlementsError,
  InvalidArgumentError,
  InvalidTokenError,
  NoBillingGroupError,
  NoEntitlementsError,
  NoExternalIdError,
  NotSignedInError,
  PlatformError,
  ServiceError,
  UnknownError,
} from '@entitlements-sdk/shared';
import { GraphQLTransportError } from '../../transport/graphql-transport.error';
import { classifyServiceError, classifyThrownError, isCancellation } from '../error-classifier';

class SessionExpiredError extends PlatformError {}

function namedError(name: string, message: string, cause?: unknown): Error {
  return Object.assign(new Error(message, { cause }), { name });
}

describe('classifyServiceError', () => {
  it.each([
    ['sdk.AmbiguousEntitlementsError', AmbiguousEntitlementsError],
    ['sdk.InvalidArgumentError', InvalidArgumentError],
    ['sdk.InvalidTokenError', InvalidTokenError],
    ['sdk.InsufficientEntitlementsError', InsufficientEntitlementsError],
    ['sdk.NoEntitlementsError', NoEntitlementsError],
    ['sdk.NoExternalIdError', NoExternalIdError],
    ['sdk.NoBillingGroupError', NoBillingGroupError],
    ['sdk.EntitlementsSequenceNotFoundError', EntitlementsSequenceNotFoundError],
    ['sdk.EntitlementsSetNotFoundError', EntitlementsSetNotFoundError],
    ['sdk.ServiceError', ServiceError],
  ])('should map errorType %s', (errorType, expected) => {
    const result = classifyServiceError({ message: 'boom', errorType });

    expect(result).toBeInstanceOf(expected);
  });

  it('should use the fixed message for a recognized type', () => {
    const result = classifyServiceError({ message: 'raw', errorType: 'sdk.NoExternalIdError' });

    expect(result.message).toBe('No external ID found for user');
  });

  it('should read errorType from extensions', () => {
    const result = classifyServiceError({
      message: 'boom',
      extensions: { errorType: 'sdk.InsufficientEntitlementsError' },
    });

    expect(result).toBeInstanceOf(InsufficientEntitlementsError);
  });

  it('should take the first matching marker when several are present', () => {
    const result = classifyServiceError({
      message: 'boom',
      errorType: 'InvalidTokenError/ServiceError',
    });

    expect(result).toBeInstanceOf(InvalidTokenError);
  });

  it('should map HTTP 401 to AuthenticationError regardless of errorType', () => {
    const result = classifyServiceError({
      message: 'boom',
      errorType: 'sdk.ServiceError',
      httpStatus: 401,
    });

    expect(result).toBeInstanceOf(AuthenticationError);
    expect(result.message).toBe('Not authorized');
  });

  it('should map HTTP 503 to FailedError', () => {
    const result = classifyServiceError({ message: 'boom', extensions: { httpStatus: 503 } });

    expect(result).toBeInstanceOf(FailedError);
    expect(result.message).toBe('Service returned HTTP 503');
  });

  it('should map an unrecognized error to FailedError carrying the payload', () => {
    const error = { message: 'boom', errorType: 'Other' };

    const result = classifyServiceError(error);

    expect(result).toBeInstanceOf(FailedError);
    expect(result.message).toBe('{"message":"boom","errorType":"Other"}');
  });

  it('should map an error without a type to FailedError', () => {
    expect(classifyServiceError({ message: 'boom', errorType: null })).toBeInstanceOf(FailedError);
  });
});

describe('classifyThrownError', () => {
  it('should return a taxonomy error unchanged', () => {
    const error = new NotSignedInError();

    expect(classifyThrownError(error)).toBe(error);
  });

  it('should return a sibling platform error unchanged', () => {
    const error = new SessionExpiredError('expired');

    expect(classifyThrownError(error)).toBe(error);
  });

  it('should return a platform error found in the cause chain', () => {
    const inner = new InvalidTokenError('bad token');
    const outer = new Error('wrapper', { cause: new Error('middle', { cause: inner }) });

    expect(classifyThrownError(outer)).toBe(inner);
  });

  it('should return a cancellation unchanged', () => {
    const abort = namedError('AbortError', 'aborted');

    expect(classifyThrownError(abort)).toBe(abort);
  });

  it('should map a nested not-authorized error to AuthenticationError', () => {
    const notAuthorized = namedError('NotAuthorizedException', 'Token expired');
    const outer = new Error('request failed', { cause: notAuthorized });

    const result = classifyThrownError(outer);

    expect(result).toBeInstanceOf(AuthenticationError);
    expect(result.message).toBe('Token expired');
    expect(result.cause).toBe(notAuthorized);
  });

  it('should prefer a not-authorized cause over a transport error above it', () => {
    const notAuthorized = namedError('NotAuthorizedException', 'Token expired');
    const transport = new GraphQLTransportError('GetExternalId request failed', { cause: notAuthorized });

    expect(classifyThrownError(transport)).toBeInstanceOf(AuthenticationError);
  });

  it('should map a transport error to FailedError', () => {
    const transport = new GraphQLTransportError('GetExternalId failed with HTTP 502', { status: 502 });

    const result = classifyThrownError(transport);

    expect(result).toBeInstanceOf(FailedError);
    expect(result.message).toBe('GetExternalId failed with HTTP 502');
    expect(result.cause).toBe(transport);
  });

  it('should map a transport error with HTTP 401 to AuthenticationError', () => {
    const transport = new GraphQLTransportError('GetExternalId failed with HTTP 401', { status: 401 });

    expect(classifyThrownError(transport)).toBeInstanceOf(AuthenticationError);
  });

  it('should wrap an unrecognized error as UnknownError', () => {
    const error = new TypeError('undefined is not a function');

    const result = classifyThrownError(error);

    expect(result).toBeInstanceOf(UnknownError);
    expect(result.message).toBe('undefined is not a function');
    expect(result.cause).toBe(error);
  });

  it('should wrap a non-error value as UnknownError', () => {
    const result = classifyThrownError('nope');

    expect(result).toBeInstanceOf(UnknownError);
    expect(result.cause).toBe('nope');
  });

  it('should stop on a cyclic cause chain', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(classifyThrownError(first)).toBeInstanceOf(UnknownError);
  });

  it('should not look deeper than 32 causes', () => {
    let error: Error = namedError('NotAuthorizedException', 'deep');
    for (let i = 0; i < 32; i++) {
      error = new Error(`level ${i}`, { cause: error });
    }

    expect(classifyThrownError(error)).toBeInstanceOf(UnknownError);
  });
});

describe('isCancellation', () => {
  it('should recognize an AbortError', () => {
    expect(isCancellation(namedError('AbortError', 'This operation was aborted'))).toBe(true);
  });

  it('should reject other errors', () => {
    expect(isCancellation(new Error('aborted'))).toBe(false);
    expect(isCancellation('AbortError')).toBe(false);
  });
});
