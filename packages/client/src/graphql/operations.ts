import { z } from 'zod';
import type { GraphQLOperation } from '../transport/graphql-transport.interface';

const entitlementRecordSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  value: z.number().int(),
});

const entitlementsSetRecordSchema = z.object({
  createdAtEpochMs: z.number(),
  updatedAtEpochMs: z.number(),
  version: z.number(),
  name: z.string(),
  description: z.string().nullish(),
  entitlements: z.array(entitlementRecordSchema),
});

const userEntitlementsRecordSchema = z.object({
  version: z.number(),
  entitlementsSetName: z.string().nullish(),
  entitlements: z.array(entitlementRecordSchema),
});

const entitlementConsumptionRecordSchema = z.object({
  consumer: z
    .object({
      id: z.string(),
      issuer: z.string(),
    })
    .nullish(),
  name: z.string(),
  value: z.number().int(),
  consumed: z.number().int(),
  available: z.number().int(),
  firstConsumedAtEpochMs: z.number().nullish(),
  lastConsumedAtEpochMs: z.number().nullish(),
});

const entitlementsConsumptionRecordSchema = z.object({
  entitlements: userEntitlementsRecordSchema,
  consumption: z.array(entitlementConsumptionRecordSchema),
});

export type EntitlementRecord = z.infer<typeof entitlementRecordSchema>;
export type EntitlementsSetRecord = z.infer<typeof entitlementsSetRecordSchema>;
export type UserEntitlementsRecord = z.infer<typeof userEntitlementsRecordSchema>;
export type EntitlementConsumptionRecord = z.infer<typeof entitlementConsumptionRecordSchema>;
export type EntitlementsConsumptionRecord = z.infer<typeof entitlementsConsumptionRecordSchema>;

const ENTITLEMENTS_SET_FIELDS = `
    createdAtEpochMs
    updatedAtEpochMs
    version
    name
    description
    entitlements {
      name
      description
      value
    }`;

export const GetEntitlementsQuery = {
  name: 'GetEntitlements',
  kind: 'query',
  document: `query GetEntitlements {
  getEntitlements {${ENTITLEMENTS_SET_FIELDS}
  }
}`,
  dataSchema: z.object({ getEntitlements: entitlementsSetRecordSchema.nullish() }),
} satisfies GraphQLOperation<unknown>;

export const GetEntitlementsConsumptionQuery = {
  name: 'GetEntitlementsConsumption',
  kind: 'query',
  document: `query GetEntitlementsConsumption {
  getEntitlementsConsumption {
    entitlements {
      version
      entitlementsSetName
      entitlements {
        name
        description
        value
      }
    }
    consumption {
      consumer {
        id
        issuer
      }
      name
      value
      consumed
      available
      firstConsumedAtEpochMs
      lastConsumedAtEpochMs
    }
  }
}`,
  dataSchema: z.object({ getEntitlementsConsumption: entitlementsConsumptionRecordSchema.nullish() }),
} satisfies GraphQLOperation<unknown>;

export const GetExternalIdQuery = {
  name: 'GetExternalId',
  kind: 'query',
  document: `query GetExternalId {
  getExternalId
}`,
  dataSchema: z.object({ getExternalId: z.string().nullish() }),
} satisfies GraphQLOperation<unknown>;

export const RedeemEntitlementsMutation = {
  name: 'RedeemEntitlements',
  kind: 'mutation',
  document: `mutation RedeemEntitlements {
  redeemEntitlements {${ENTITLEMENTS_SET_FIELDS}
  }
}`,
  dataSchema: z.object({ redeemEntitlements: entitlementsSetRecordSchema.nullish() }),
} satisfies GraphQLOperation<unknown>;

export const ConsumeBooleanEntitlementsMutation = {
  name: 'ConsumeBooleanEntitlements',
  kind: 'mutation',
  document: `mutation ConsumeBooleanEntitlements($entitlementNames: [String!]!) {
  consumeBooleanEntitlements(entitlementNames: $entitlementNames)
}`,
  dataSchema: z.object({ consumeBooleanEntitlements: z.boolean().nullish() }),
} satisfies GraphQLOperation<unknown>;

export type GetEntitlementsData = z.infer<typeof GetEntitlementsQuery.dataSchema>;
export type GetEntitlementsConsumptionData = z.infer<typeof GetEntitlementsConsumptionQuery.dataSchema>;
export type GetExternalIdData = z.infer<typeof GetExternalIdQuery.dataSchema>;
export type RedeemEntitlementsData = z.infer<typeof RedeemEntitlementsMutation.dataSchema>;
export type ConsumeBooleanEntitlementsData = z.infer<typeof ConsumeBooleanEntitlementsMutation.dataSchema>;
