import type { z } from 'zod';

export type GraphQLOperationKind = 'query' | 'mutation';

export interface GraphQLOperation<TData> {
  name: string;
  kind: GraphQLOperationKind;
  document: string;
  /** Validates the `data` member of a successful response. */
  dataSchema: z.ZodType<TData, z.ZodTypeDef, unknown>;
}

export interface GraphQLServiceError {
  message: string;
  errorType?: string | null;
  httpStatus?: number;
  path?: ReadonlyArray<string | number>;
  extensions?: Record<string, unknown>;
}

export interface GraphQLResponse<TData> {
  data?: TData | null;
  errors?: GraphQLServiceError[];
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export type GraphQLVariables = Record<string, unknown>;

export interface GraphQLTransport {
  query<TData>(
    operation: GraphQLOperation<TData>,
    variables?: GraphQLVariables,
    options?: RequestOptions,
  ): Promise<GraphQLResponse<TData>>;

  mutate<TData>(
    operation: GraphQLOperation<TData>,
    variables?: GraphQLVariables,
    options?: RequestOptions,
  ): Promise<GraphQLResponse<TData>>;
}

export function hasErrors<TData>(
  response: GraphQLResponse<TData>,
): response is GraphQLResponse<TData> & { errors: [GraphQLServiceError, ...GraphQLServiceError[]] } {
  return response.errors !== undefined && response.errors.length > 0;
}
