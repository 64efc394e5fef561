export interface Entitlement {
  readonly name: string;
  readonly description?: string;
  /** Quantity granted, a non-negative integer. Boolean entitlements use 0 or 1. */
  readonly value: number;
}

/**
 * A named, versioned bundle of entitlements as redeemed for the user.
 */
export interface EntitlementsSet {
  readonly name: string;
  readonly description?: string;
  /** Unique by value: no two members share name, description and value. */
  readonly entitlements: readonly Entitlement[];
  readonly version: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * The entitlements currently assigned to the user.
 *
 * `version` is composite: the integer part is the user entitlements version and
 * the fractional part, scaled by 100000, is the entitlements set version. Use
 * `splitUserEntitlementsVersion` to take it apart.
 */
export interface UserEntitlements {
  readonly version: number;
  readonly entitlementsSetName?: string;
  readonly entitlements: readonly Entitlement[];
}

/** A sub-user resource consuming its own share of an entitlement. */
export interface EntitlementConsumer {
  readonly id: string;
  readonly issuer: string;
}

export interface EntitlementConsumption {
  readonly name: string;
  /** Absent when the consumption is attributed to the user directly. */
  readonly consumer?: EntitlementConsumer;
  readonly value: number;
  readonly consumed: number;
  /** `available + consumed === value` */
  readonly available: number;
  readonly firstConsumedAtEpochMs?: number;
  readonly lastConsumedAtEpochMs?: number;
}

export interface EntitlementsConsumption {
  readonly entitlements: UserEntitlements;
  readonly consumption: readonly EntitlementConsumption[];
}
