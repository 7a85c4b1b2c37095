/**
 * FlexReport API Client
 *
 * Authenticates against the GraphQL endpoint, triggers report executions,
 * reads their status and creates report definitions.
 */

import {
  AuthenticationError,
  type FlexReportDefinition,
  getConfig,
  type JobStage,
  type JobStatus,
  logger,
  MalformedResponseError,
  RemoteRejectedError,
  type ReportSummary,
  type Session,
  type StatusSnapshot,
} from '@flexreport/shared';
import type { z } from 'zod';
import { mapRequestError } from '../base/error-mapping.js';
import { GraphQLClient } from '../graphql/GraphQLClient.js';
import { CreateReportDataSchema, LoginDataSchema, ReportNodeDataSchema, TriggerDataSchema } from './schemas.js';

export interface FlexReportClientConfig {
  graphqlUrl: string;
  timeoutMs: number;
}

/** Token value the login endpoint uses in place of a real token */
const NULL_TOKEN_SENTINEL = 'null';

const LOGIN_MUTATION = 'mutation Login($apiKey:String!){loginAPI(apiKey:$apiKey){accessToken}}';

const CREATE_REPORT_MUTATION = `mutation CreateFlexReport($name: String!, $description: String!, $sqlStatement: String!, $needBackLinkingForTags: Boolean!, $dataGranularity: FlexReportDataGranularity!, $limit: Int!, $timeRangeLast: Int!, $excludeCurrent: Boolean!) {
  createFlexReport(input: {
    name: $name,
    description: $description,
    notification: {sendUserEmail: false},
    query: {
      sqlStatement: $sqlStatement,
      needBackLinkingForTags: $needBackLinkingForTags,
      dataGranularity: $dataGranularity,
      limit: $limit,
      timeRange: {last: $timeRangeLast, excludeCurrent: $excludeCurrent}
    }
  }) {
    id
    name
  }
}`;

// The node id is inlined as a GraphQL string literal; JSON string escaping is valid there
function triggerMutation(handle: string): string {
  return `mutation executeFlexReport{triggerFlexReportExecution(id:${JSON.stringify(handle)})}`;
}

function reportQuery(handle: string): string {
  return `query queryReport{node(id:${JSON.stringify(handle)}){id ... on FlexReport{name result{status reportUpdatedOn contents{preSignedUrl}}}}}`;
}

export function isValidSession(session: Session | undefined): session is Session {
  return Boolean(session && session.accessToken.trim() && session.accessToken !== NULL_TOKEN_SENTINEL);
}

export function normalizeStatus(rawStatus: string): JobStatus {
  const status = rawStatus.trim().toUpperCase();
  if (status === 'QUEUED' || status === 'COMPLETED' || status === 'FAILED') {
    return status;
  }
  return 'RUNNING';
}

export class FlexReportClient {
  private readonly graphql: GraphQLClient;
  private readonly log = logger.child({ component: 'flexreport-client' });

  constructor(config?: Partial<FlexReportClientConfig>) {
    const { api } = getConfig();
    this.graphql = new GraphQLClient({
      endpoint: config?.graphqlUrl ?? api.graphqlUrl,
      timeoutMs: config?.timeoutMs ?? api.requestTimeoutMs,
    });
  }

  /**
   * Exchange an API key for an access token
   */
  async authenticate(credential: string): Promise<Session> {
    if (!credential.trim()) {
      throw new AuthenticationError('API key cannot be empty');
    }

    const data = await this.call('authenticate', LoginDataSchema, {
      query: LOGIN_MUTATION,
      variables: { apiKey: credential },
    });

    const accessToken = data.loginAPI?.accessToken ?? '';
    const session: Session = { accessToken, issuedAt: new Date() };
    if (!isValidSession(session)) {
      throw new AuthenticationError('Failed to obtain access token. Please check your API key.');
    }

    this.log.debug('Authenticated');
    return session;
  }

  /**
   * Trigger execution of a report. Resolves once the service acknowledges it.
   */
  async submitJob(session: Session, handle: string): Promise<true> {
    this.requireSession(session);
    this.requireHandle(handle, 'submit');

    const data = await this.call('submit', TriggerDataSchema, { query: triggerMutation(handle) }, session);

    if (data.triggerFlexReportExecution !== true) {
      throw new RemoteRejectedError('Report execution was not acknowledged', { stage: 'submit' });
    }

    this.log.debug('Report execution triggered', { handle });
    return true;
  }

  /**
   * Read the current status of a report and, once completed, its download URL
   */
  async pollStatus(session: Session, handle: string): Promise<StatusSnapshot> {
    this.requireSession(session);
    this.requireHandle(handle, 'poll');

    const node = await this.fetchReportNode(session, handle, 'poll');
    const rawStatus = node.result?.status;
    if (!rawStatus) {
      throw new MalformedResponseError('Failed to retrieve report status', { stage: 'poll' });
    }

    const status = normalizeStatus(rawStatus);
    const snapshot: StatusSnapshot = { status, rawStatus };
    if (node.name) snapshot.reportName = node.name;

    const updatedOn = node.result?.reportUpdatedOn;
    if (updatedOn !== null && updatedOn !== undefined) snapshot.updatedOn = String(updatedOn);

    const url = node.result?.contents?.[0]?.preSignedUrl;
    if (status === 'COMPLETED' && url && url !== NULL_TOKEN_SENTINEL) {
      snapshot.artifactUrl = url;
    }

    this.log.debug('Report status', { handle, status: rawStatus });
    return snapshot;
  }

  /**
   * Look up the display name of a report
   */
  async describeReport(session: Session, handle: string): Promise<ReportSummary> {
    this.requireSession(session);
    this.requireHandle(handle, 'lookup');

    const node = await this.fetchReportNode(session, handle, 'lookup');
    if (!node.name) {
      throw new MalformedResponseError('Failed to retrieve report name', { stage: 'lookup' });
    }

    return { handle, name: node.name };
  }

  /**
   * Create a report from a definition
   */
  async createReport(session: Session, definition: FlexReportDefinition): Promise<ReportSummary> {
    this.requireSession(session);

    const data = await this.call(
      'create',
      CreateReportDataSchema,
      {
        query: CREATE_REPORT_MUTATION,
        variables: {
          name: definition.name,
          description: definition.description,
          sqlStatement: definition.sqlStatement,
          dataGranularity: definition.dataGranularity,
          limit: definition.limit,
          timeRangeLast: definition.timeRange,
          needBackLinkingForTags: definition.backlinking,
          excludeCurrent: definition.excludeCurrent,
        },
      },
      session
    );

    if (!data.createFlexReport) {
      throw new MalformedResponseError('FlexReport id not found in response', { stage: 'create' });
    }

    return { handle: data.createFlexReport.id, name: data.createFlexReport.name };
  }

  private async fetchReportNode(session: Session, handle: string, stage: JobStage) {
    const data = await this.call(stage, ReportNodeDataSchema, { query: reportQuery(handle) }, session);
    if (!data.node) {
      throw new MalformedResponseError(`Report ${handle} was not found in the response`, { stage });
    }
    return data.node;
  }

  private async call<S extends z.ZodTypeAny>(
    stage: JobStage,
    schema: S,
    request: { query: string; variables?: Record<string, unknown> },
    session?: Session
  ): Promise<z.output<S>> {
    let data: unknown;
    try {
      data = await this.graphql.execute(request, { accessToken: session?.accessToken });
    } catch (error) {
      throw mapRequestError(error, stage);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      if (stage === 'authenticate') {
        throw new AuthenticationError('Failed to authenticate: invalid API response', { cause: parsed.error });
      }
      throw new MalformedResponseError('Unexpected response shape', { stage, cause: parsed.error });
    }
    return parsed.data;
  }

  private requireSession(session: Session): void {
    if (!isValidSession(session)) {
      throw new AuthenticationError('Session is not valid; authenticate first');
    }
  }

  private requireHandle(handle: string, stage: JobStage): void {
    if (!handle.trim()) {
      throw new RemoteRejectedError('Report handle cannot be empty', { stage });
    }
  }
}
