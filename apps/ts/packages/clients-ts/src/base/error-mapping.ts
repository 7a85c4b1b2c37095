import {
  AuthenticationError,
  FlexReportError,
  getErrorMessage,
  type JobStage,
  MalformedResponseError,
  RemoteRejectedError,
  TransportError,
} from '@flexreport/shared';
import { GraphQLResponseError } from '../graphql/GraphQLClient.js';
import { HttpRequestError } from './http-client.js';

const CREDENTIAL_STATUSES = new Set([401, 403]);

export interface ErrorMappingOptions {
  /** The request itself carries the API key, so 401/403 mean a rejected credential */
  credentialInRequest?: boolean;
}

/**
 * Translate transport and GraphQL failures into the domain taxonomy for a stage
 */
export function mapRequestError(error: unknown, stage: JobStage, options: ErrorMappingOptions = {}): FlexReportError {
  if (error instanceof FlexReportError) {
    return error;
  }

  const credentialInRequest = options.credentialInRequest ?? stage === 'authenticate';

  if (error instanceof GraphQLResponseError) {
    if (stage === 'authenticate') {
      return new AuthenticationError(`Login rejected: ${error.message}`, { cause: error });
    }
    return new RemoteRejectedError(error.message, { stage, cause: error });
  }

  if (error instanceof HttpRequestError) {
    if (error.kind === 'invalid-json') {
      return new MalformedResponseError(error.message, { stage, cause: error });
    }
    if (error.kind === 'http' && credentialInRequest && error.status !== undefined && CREDENTIAL_STATUSES.has(error.status)) {
      return new AuthenticationError(`Credential rejected (HTTP ${error.status})`, { cause: error });
    }
    const detail = error.kind === 'http' ? `HTTP ${error.status ?? 'error'}: ${error.message}` : error.message;
    return new TransportError(detail, { stage, cause: error });
  }

  return new TransportError(getErrorMessage(error), { stage, cause: error });
}
