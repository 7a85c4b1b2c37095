/**
 * FlexReport domain types shared by the clients and the CLI
 */

/**
 * Stages of a single job's lifecycle, used to label failures
 */
export type JobStage = 'authenticate' | 'lookup' | 'submit' | 'poll' | 'download' | 'create' | 'list';

/**
 * Human-readable name and opaque handle of one report job
 */
export interface JobRef {
  name: string;
  handle: string;
}

/**
 * Access token obtained from the login exchange, valid for one run
 */
export interface Session {
  accessToken: string;
  issuedAt: Date;
}

/**
 * Normalized report status. Anything the service reports other than
 * QUEUED, COMPLETED or FAILED is treated as RUNNING.
 */
export type JobStatus = 'QUEUED' | 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface StatusSnapshot {
  status: JobStatus;
  /** Status string exactly as reported by the service */
  rawStatus: string;
  reportName?: string;
  updatedOn?: string;
  /** Pre-signed download URL, only set once the report is COMPLETED */
  artifactUrl?: string;
}

export interface ReportSummary {
  handle: string;
  name: string;
}

/**
 * Validated report definition used to create a FlexReport
 */
export interface FlexReportDefinition {
  name: string;
  description: string;
  sqlStatement: string;
  dataGranularity: string;
  limit: number;
  timeRange: number;
  backlinking: boolean;
  excludeCurrent: boolean;
}

export interface PerspectiveSummary {
  id: string;
  name: string;
}

export interface PerspectiveGroup {
  refId: string;
  name: string;
}
