import {
  EntitlementConsumption,
  EntitlementsConsumption,
  EntitlementsSet,
  splitUserEntitlementsVersion,
} from '@entitlements-sdk/shared';

export function formatEntitlementsSet(set: EntitlementsSet): string[] {
  const lines = [`${set.name} (version ${set.version})`];
  if (set.description) {
    lines.push(`  ${set.description}`);
  }
  lines.push(`  updated ${set.updatedAt.toISOString()}`);
  for (const entitlement of set.entitlements) {
    const description = entitlement.description ? ` (${entitlement.description})` : '';
    lines.push(`  ${entitlement.name} = ${entitlement.value}${description}`);
  }
  return lines;
}

export function formatConsumption(consumption: EntitlementsConsumption): string[] {
  const { entitlements } = consumption;
  const [userVersion, setVersion] = splitUserEntitlementsVersion(entitlements.version);
  const setName = entitlements.entitlementsSetName ?? 'No entitlements set';

  const lines = [`${setName} (user version ${userVersion}, set version ${setVersion})`];
  for (const entitlement of entitlements.entitlements) {
    lines.push(`  ${entitlement.name} = ${entitlement.value}`);
  }
  if (consumption.consumption.length > 0) {
    lines.push('Consumption:');
    lines.push(...consumption.consumption.map(formatConsumptionLine));
  }
  return lines;
}

function formatConsumptionLine(item: EntitlementConsumption): string {
  const consumer = item.consumer ? ` [${item.consumer.issuer}/${item.consumer.id}]` : '';
  const last = item.lastConsumedAtEpochMs !== undefined
    ? `, last ${new Date(item.lastConsumedAtEpochMs).toISOString()}`
    : '';
  return `  ${item.name}${consumer}: ${item.consumed}/${item.value} consumed, ${item.available} available${last}`;
}
