import { Logger, LoggerService } from '@nestjs/common';
import { z } from 'zod';
import type { SessionProvider } from '../auth/session-provider.interface';
import type { EntitlementsClientConfig } from '../config/env.schema';
import { GraphQLTransportError } from './graphql-transport.error';
import type {
  GraphQLOperation,
  GraphQLResponse,
  GraphQLServiceError,
  GraphQLTransport,
  GraphQLVariables,
  RequestOptions,
} from './graphql-transport.interface';

const graphQLErrorSchema = z
  .object({
    message: z.string(),
    errorType: z.string().nullish(),
    httpStatus: z.number().optional(),
    path: z.array(z.union([z.string(), z.number()])).optional(),
    extensions: z.record(z.unknown()).optional(),
  })
  .passthrough();

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(graphQLErrorSchema).optional(),
});

export interface HttpGraphQLTransportOptions {
  config: EntitlementsClientConfig;
  sessionProvider: SessionProvider;
  logger?: LoggerService;
}

/**
 * GraphQL over HTTP POST using the global `fetch`, authorized with the
 * session's token.
 */
export class HttpGraphQLTransport implements GraphQLTransport {
  private readonly config: EntitlementsClientConfig;
  private readonly sessionProvider: SessionProvider;
  private readonly logger: LoggerService;

  constructor(options: HttpGraphQLTransportOptions) {
    this.config = options.config;
    this.sessionProvider = options.sessionProvider;
    this.logger = options.logger ?? new Logger(HttpGraphQLTransport.name);
  }

  query<TData>(
    operation: GraphQLOperation<TData>,
    variables?: GraphQLVariables,
    options?: RequestOptions,
  ): Promise<GraphQLResponse<TData>> {
    return this.execute(operation, variables, options);
  }

  mutate<TData>(
    operation: GraphQLOperation<TData>,
    variables?: GraphQLVariables,
    options?: RequestOptions,
  ): Promise<GraphQLResponse<TData>> {
    return this.execute(operation, variables, options);
  }

  private async execute<TData>(
    operation: GraphQLOperation<TData>,
    variables: GraphQLVariables = {},
    options: RequestOptions = {},
  ): Promise<GraphQLResponse<TData>> {
    const { signal } = options;
    signal?.throwIfAborted();

    const token = await this.sessionProvider.getAuthorizationToken();

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    let status: number;
    let ok: boolean;
    let text: string;

    try {
      // the caller may have cancelled while the token was fetched
      signal?.throwIfAborted();
      this.logger.debug?.(`${operation.kind} ${operation.name} -> ${this.config.apiUrl}`);
      const response = await fetch(this.config.apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: token,
        },
        body: JSON.stringify({
          query: operation.document,
          operationName: operation.name,
          variables,
        }),
        signal: controller.signal,
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (timedOut) {
        throw new GraphQLTransportError(
          `${operation.name} timed out after ${this.config.timeoutMs}ms`,
          { cause: error },
        );
      }
      if (signal?.aborted) {
        throw error;
      }
      throw new GraphQLTransportError(
        `${operation.name} request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }

    const envelope = this.parseEnvelope(text);

    if (!ok) {
      if (envelope?.errors?.length) {
        return { data: null, errors: this.stampHttpStatus(envelope.errors, status) };
      }
      throw new GraphQLTransportError(`${operation.name} failed with HTTP ${status}`, { status });
    }

    if (!envelope) {
      throw new GraphQLTransportError(`${operation.name} returned an unreadable response`, { status });
    }
    if (envelope.errors?.length) {
      return { data: null, errors: envelope.errors };
    }
    if (envelope.data === null || envelope.data === undefined) {
      return { data: null };
    }

    const parsed = operation.dataSchema.safeParse(envelope.data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new GraphQLTransportError(
        `${operation.name} returned a malformed response: ${issues.join('; ')}`,
        { status },
      );
    }

    return { data: parsed.data };
  }

  private parseEnvelope(text: string): z.infer<typeof envelopeSchema> | undefined {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return undefined;
    }
    const result = envelopeSchema.safeParse(json);
    return result.success ? result.data : undefined;
  }

  private stampHttpStatus(errors: GraphQLServiceError[], status: number): GraphQLServiceError[] {
    return errors.map((error) => ({ ...error, httpStatus: error.httpStatus ?? status }));
  }
}
