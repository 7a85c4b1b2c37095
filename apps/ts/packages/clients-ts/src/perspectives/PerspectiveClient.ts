/**
 * Perspective REST client (v1 API)
 *
 * The v1 API authenticates with an `api_key` query parameter rather than a
 * session token.
 */

import {
  AuthenticationError,
  getConfig,
  logger,
  MalformedResponseError,
  type PerspectiveGroup,
  type PerspectiveSummary,
} from '@flexreport/shared';
import { z } from 'zod';
import { mapRequestError } from '../base/error-mapping.js';
import { requestJson } from '../base/http-client.js';

export interface PerspectiveClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const PerspectiveIndexSchema = z.record(
  z.string(),
  z
    .object({
      name: z.string(),
      active: z.boolean().optional(),
    })
    .passthrough()
);

const PerspectiveSchemaResponse = z
  .object({
    schema: z
      .object({
        constants: z
          .array(
            z
              .object({
                list: z
                  .array(
                    z
                      .object({
                        ref_id: z.union([z.string(), z.number()]),
                        name: z.string(),
                      })
                      .passthrough()
                  )
                  .optional(),
              })
              .passthrough()
          )
          .optional(),
      })
      .passthrough(),
  })
  .passthrough();

function byName<T extends { name: string }>(a: T, b: T): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export class PerspectiveClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly log = logger.child({ component: 'perspective-client' });

  constructor(config: PerspectiveClientConfig) {
    if (!config.apiKey.trim()) {
      throw new AuthenticationError('API key cannot be empty');
    }
    const { api } = getConfig();
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? api.restUrl;
    this.timeoutMs = config.timeoutMs ?? api.requestTimeoutMs;
  }

  /**
   * List active perspectives, sorted by name
   */
  async listPerspectives(): Promise<PerspectiveSummary[]> {
    const body = await this.get('/v1/perspective_schemas');
    const parsed = PerspectiveIndexSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError('Unexpected perspective list response', { stage: 'list', cause: parsed.error });
    }

    const perspectives = Object.entries(parsed.data)
      .filter(([, perspective]) => perspective.active === true)
      .map(([id, perspective]) => ({ id, name: perspective.name }))
      .sort(byName);

    this.log.debug('Listed perspectives', { count: perspectives.length });
    return perspectives;
  }

  /**
   * List the groups defined in one perspective, sorted by name
   */
  async listGroups(perspectiveId: string): Promise<PerspectiveGroup[]> {
    const body = await this.get(`/v1/perspective_schemas/${encodeURIComponent(perspectiveId)}`);
    const parsed = PerspectiveSchemaResponse.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(`Unexpected schema response for perspective ${perspectiveId}`, {
        stage: 'list',
        cause: parsed.error,
      });
    }

    return (parsed.data.schema.constants ?? [])
      .flatMap((constant) => constant.list ?? [])
      .map((group) => ({ refId: String(group.ref_id), name: group.name }))
      .sort(byName);
  }

  private async get(endpoint: string): Promise<unknown> {
    try {
      return await requestJson(endpoint, {
        baseUrl: this.baseUrl,
        query: { api_key: this.apiKey },
        headers: { Accept: 'application/json' },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw mapRequestError(error, 'list', { credentialInRequest: true });
    }
  }
}
