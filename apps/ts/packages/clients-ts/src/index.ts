export * from './artifact/ArtifactDownloader.js';
export * from './base/error-mapping.js';
export * from './base/http-client.js';
export * from './flexreport/FlexReportClient.js';
export * from './flexreport/FlexReportJobRunner.js';
export * from './flexreport/job-poller.js';
export * from './flexreport/schemas.js';
export * from './graphql/GraphQLClient.js';
export * from './perspectives/PerspectiveClient.js';
