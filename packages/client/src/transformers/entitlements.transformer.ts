import type {
  Entitlement,
  EntitlementConsumption,
  EntitlementsConsumption,
  EntitlementsSet,
} from '@entitlements-sdk/shared';
import type {
  EntitlementConsumptionRecord,
  EntitlementRecord,
  EntitlementsConsumptionRecord,
  EntitlementsSetRecord,
} from '../graphql/operations';

/**
 * Maps GraphQL result records to the public entity types. Callers check for
 * errors and absent data before calling in. GraphQL reports missing optional
 * fields as null; the entities leave them out.
 */
export const EntitlementsTransformer = {
  toEntitlementsSet(record: EntitlementsSetRecord): EntitlementsSet {
    return {
      name: record.name,
      ...(record.description != null ? { description: record.description } : {}),
      entitlements: EntitlementsTransformer.toEntitlementSet(record.entitlements),
      version: record.version,
      createdAt: new Date(record.createdAtEpochMs),
      updatedAt: new Date(record.updatedAtEpochMs),
    };
  },

  toEntitlementsConsumption(record: EntitlementsConsumptionRecord): EntitlementsConsumption {
    return {
      entitlements: {
        version: record.entitlements.version,
        ...(record.entitlements.entitlementsSetName != null
          ? { entitlementsSetName: record.entitlements.entitlementsSetName }
          : {}),
        entitlements: EntitlementsTransformer.toEntitlements(record.entitlements.entitlements),
      },
      consumption: record.consumption.map(toEntitlementConsumption),
    };
  },

  /** Ordered, duplicates kept. */
  toEntitlements(records: readonly EntitlementRecord[]): Entitlement[] {
    return records.map(toEntitlement);
  },

  /** Unique by value, in order of first occurrence. */
  toEntitlementSet(records: readonly EntitlementRecord[]): Entitlement[] {
    const byKey = new Map<string, Entitlement>();
    for (const record of records) {
      const entitlement = toEntitlement(record);
      const key = JSON.stringify([entitlement.name, entitlement.description ?? null, entitlement.value]);
      if (!byKey.has(key)) {
        byKey.set(key, entitlement);
      }
    }
    return [...byKey.values()];
  },
};

function toEntitlement(record: EntitlementRecord): Entitlement {
  return {
    name: record.name,
    ...(record.description != null ? { description: record.description } : {}),
    value: record.value,
  };
}

function toEntitlementConsumption(record: EntitlementConsumptionRecord): EntitlementConsumption {
  return {
    name: record.name,
    ...(record.consumer ? { consumer: { id: record.consumer.id, issuer: record.consumer.issuer } } : {}),
    value: record.value,
    consumed: record.consumed,
    available: record.available,
    ...(record.firstConsumedAtEpochMs != null ? { firstConsumedAtEpochMs: record.firstConsumedAtEpochMs } : {}),
    ...(record.lastConsumedAtEpochMs != null ? { lastConsumedAtEpochMs: record.lastConsumedAtEpochMs } : {}),
  };
}
