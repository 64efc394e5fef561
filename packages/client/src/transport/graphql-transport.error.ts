/**
 * Failure of the GraphQL exchange itself: an HTTP error without a GraphQL
 * body, an unreadable or malformed payload, or a timeout.
 */
export class GraphQLTransportError extends Error {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options);
    this.name = 'GraphQLTransportError';
    this.status = options?.status;
  }
}
