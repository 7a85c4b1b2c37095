/**
 * Minimal GraphQL-over-HTTP client
 *
 * Sends one operation per POST and unwraps the `{ data, errors }` envelope.
 * A non-empty `errors` array is raised as GraphQLResponseError even when
 * partial data came back.
 */

import { z } from 'zod';
import { HttpRequestError, requestJson } from '../base/http-client.js';

export interface GraphQLRequest {
  query: string;
  variables?: Record<string, unknown>;
}

export interface GraphQLClientConfig {
  endpoint: string;
  timeoutMs?: number;
}

export class GraphQLResponseError extends Error {
  constructor(public readonly messages: string[]) {
    super(messages.join(', '));
    this.name = 'GraphQLResponseError';
  }
}

const GraphQLEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(
      z
        .object({
          message: z.string().optional(),
        })
        .passthrough()
    )
    .nullable()
    .optional(),
});

const DEFAULT_HEADERS: Record<string, string> = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
};

export class GraphQLClient {
  private readonly endpoint: string;
  private readonly timeoutMs?: number;

  constructor(config: GraphQLClientConfig) {
    this.endpoint = config.endpoint;
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Execute an operation and return its `data` payload, still unvalidated
   */
  async execute(request: GraphQLRequest, options: { accessToken?: string } = {}): Promise<unknown> {
    const headers = options.accessToken
      ? { ...DEFAULT_HEADERS, Authorization: `Bearer ${options.accessToken}` }
      : DEFAULT_HEADERS;

    const body = await requestJson(this.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify({ query: request.query, variables: request.variables ?? {} }),
      timeoutMs: this.timeoutMs,
    });

    const envelope = GraphQLEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new HttpRequestError('Response is not a GraphQL envelope', 'invalid-json', { body });
    }

    const errors = envelope.data.errors ?? [];
    if (errors.length > 0) {
      throw new GraphQLResponseError(errors.map((error) => error.message ?? 'Unknown error'));
    }

    return envelope.data.data;
  }
}
