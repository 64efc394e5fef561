import { Logger, LoggerService } from '@nestjs/common';
import {
  EntitlementsConsumption,
  EntitlementsSet,
  FailedError,
  InvalidArgumentError,
  NotSignedInError,
} from '@entitlements-sdk/shared';
import type { SessionProvider } from './auth/session-provider.interface';
import { classifyServiceError, classifyThrownError, isCancellation } from './errors/error-classifier';
import {
  ConsumeBooleanEntitlementsMutation,
  GetEntitlementsConsumptionQuery,
  GetEntitlementsQuery,
  GetExternalIdQuery,
  RedeemEntitlementsMutation,
} from './graphql/operations';
import {
  GraphQLOperation,
  GraphQLResponse,
  GraphQLTransport,
  GraphQLVariables,
  RequestOptions,
  hasErrors,
} from './transport/graphql-transport.interface';
import { EntitlementsTransformer } from './transformers/entitlements.transformer';

export const ENTITLEMENTS_LOG_CONTEXT = 'Entitlements';

const NO_ENTITLEMENTS_RETURNED = 'No entitlements returned in response';

/**
 * Client for the entitlements service.
 *
 * Every method requires a signed in user and rejects with an
 * `EntitlementsError`, or with the `AbortError` of a cancelled `signal`.
 */
export interface EntitlementsClient {
  /**
   * Get the current set of entitlements for the user.
   *
   * @returns the user's entitlements set, or `null` if the user is unentitled.
   * @deprecated Use {@link EntitlementsClient.getEntitlementsConsumption} instead.
   */
  getEntitlements(options?: RequestOptions): Promise<EntitlementsSet | null>;

  /** Get the user's entitlements and how much of each has been consumed. */
  getEntitlementsConsumption(options?: RequestOptions): Promise<EntitlementsConsumption>;

  /** Get the external ID the entitlements service associates with the user. */
  getExternalId(options?: RequestOptions): Promise<string>;

  /**
   * Redeem entitlements for the user based on the claims of their identity.
   *
   * @returns the entitlements set the user has once redemption has completed.
   */
  redeemEntitlements(options?: RequestOptions): Promise<EntitlementsSet>;

  /**
   * Record consumption of boolean entitlements.
   *
   * Rejects with `InvalidArgumentError` when a name is not recognized and with
   * `InsufficientEntitlementsError` when the user is not entitled to one.
   */
  consumeBooleanEntitlements(entitlementNames: readonly string[], options?: RequestOptions): Promise<void>;
}

export class DefaultEntitlementsClient implements EntitlementsClient {
  private readonly logger: LoggerService;

  constructor(
    private readonly sessionProvider: SessionProvider,
    private readonly transport: GraphQLTransport,
    logger?: LoggerService,
  ) {
    this.logger = logger ?? new Logger(ENTITLEMENTS_LOG_CONTEXT);
  }

  async getEntitlements(options?: RequestOptions): Promise<EntitlementsSet | null> {
    const data = await this.execute(GetEntitlementsQuery, undefined, options);
    const result = data?.getEntitlements;
    return result ? EntitlementsTransformer.toEntitlementsSet(result) : null;
  }

  async getEntitlementsConsumption(options?: RequestOptions): Promise<EntitlementsConsumption> {
    const data = await this.execute(GetEntitlementsConsumptionQuery, undefined, options);
    const result = data?.getEntitlementsConsumption;
    if (!result) {
      throw new FailedError(NO_ENTITLEMENTS_RETURNED);
    }
    return EntitlementsTransformer.toEntitlementsConsumption(result);
  }

  async getExternalId(options?: RequestOptions): Promise<string> {
    const data = await this.execute(GetExternalIdQuery, undefined, options);
    const result = data?.getExternalId;
    if (result === null || result === undefined) {
      throw new FailedError(NO_ENTITLEMENTS_RETURNED);
    }
    return result;
  }

  async redeemEntitlements(options?: RequestOptions): Promise<EntitlementsSet> {
    const data = await this.execute(RedeemEntitlementsMutation, undefined, options);
    const result = data?.redeemEntitlements;
    if (!result) {
      throw new FailedError(NO_ENTITLEMENTS_RETURNED);
    }
    return EntitlementsTransformer.toEntitlementsSet(result);
  }

  async consumeBooleanEntitlements(
    entitlementNames: readonly string[],
    options?: RequestOptions,
  ): Promise<void> {
    if (entitlementNames.length === 0) {
      throw new InvalidArgumentError('At least one entitlement name must be provided');
    }
    const data = await this.execute(
      ConsumeBooleanEntitlementsMutation,
      { entitlementNames: [...entitlementNames] },
      options,
    );
    if (data?.consumeBooleanEntitlements === null || data?.consumeBooleanEntitlements === undefined) {
      throw new FailedError(NO_ENTITLEMENTS_RETURNED);
    }
  }

  /**
   * Run one operation: check the session, call the transport once and turn
   * every failure into an entitlements error.
   */
  private async execute<TData>(
    operation: GraphQLOperation<TData>,
    variables: GraphQLVariables | undefined,
    options: RequestOptions = {},
  ): Promise<TData | null> {
    if (!(await this.isSignedIn())) {
      throw new NotSignedInError();
    }

    this.logger.verbose?.(`${operation.name} started`);

    let response: GraphQLResponse<TData>;
    try {
      response =
        operation.kind === 'mutation'
          ? await this.transport.mutate(operation, variables, options)
          : await this.transport.query(operation, variables, options);
    } catch (error) {
      const { signal } = options;
      if (signal?.aborted && (isCancellation(error) || error === signal.reason)) {
        throw error;
      }
      const recognized = classifyThrownError(error);
      this.logger.debug?.(`${operation.name} failed: ${String(error)} -> ${recognized.name}`);
      throw recognized;
    }

    if (hasErrors(response)) {
      this.logger.warn(`${operation.name} errors = ${JSON.stringify(response.errors)}`);
      throw classifyServiceError(response.errors[0]);
    }

    return response.data ?? null;
  }

  private async isSignedIn(): Promise<boolean> {
    try {
      return await this.sessionProvider.isSignedIn();
    } catch (error) {
      throw classifyThrownError(error);
    }
  }
}
