import { InvalidArgumentError } from '../errors/entitlements.errors';

const ENTITLEMENTS_SET_VERSION_SCALE = 100000;
const ENTITLEMENTS_SET_VERSION_DIGITS = 5;

/**
 * Split a composite user entitlements version into the user entitlements
 * version (integer part) and the entitlements set version (fractional part
 * scaled by 100000).
 *
 * @throws InvalidArgumentError when the version is negative or carries more
 * than five fractional digits.
 */
export function splitUserEntitlementsVersion(version: number): [number, number] {
  if (version < 0) {
    throw new InvalidArgumentError('version negative');
  }

  const userEntitlementsVersion = Math.trunc(version);
  const entitlementsSetVersion = Math.round(
    (version * ENTITLEMENTS_SET_VERSION_SCALE) % ENTITLEMENTS_SET_VERSION_SCALE,
  );

  const reconstructed = userEntitlementsVersion + entitlementsSetVersion / ENTITLEMENTS_SET_VERSION_SCALE;
  if (Number(reconstructed.toFixed(ENTITLEMENTS_SET_VERSION_DIGITS)) !== version) {
    throw new InvalidArgumentError('version too precise');
  }

  return [userEntitlementsVersion, entitlementsSetVersion];
}

export function isValidUserEntitlementsVersion(version: number): boolean {
  try {
    splitUserEntitlementsVersion(version);
    return true;
  } catch {
    return false;
  }
}
