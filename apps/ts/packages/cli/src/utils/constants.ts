export const CLI_NAME = 'flexreport';
export const CLI_VERSION = '0.1.0';
export const CLI_DESCRIPTION = 'CLI for FlexReport jobs - run, trigger, create and export perspectives';

export const DEFAULT_JOB_LIST_FILE = 'daily-list.txt';
export const PERSPECTIVES_FILE = 'Perspectives.csv';
export const CREATED_IDS_FILE = 'previous-run.list';
export const CREATED_NAMES_FILE = 'successful_reports.list';
