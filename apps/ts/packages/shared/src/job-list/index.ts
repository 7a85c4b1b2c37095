/**
 * Job list parsing
 *
 * A job list holds one "Report Name,report-handle" record per line, e.g.
 *   Azure Daily Cost,crn:1234:flexreports/0f8c2b7e-0000-4000-8000-000000000001
 */

import { readFile } from 'node:fs/promises';
import type { JobRef } from '../types/flexreport.js';

export interface JobListIssue {
  line: number;
  content: string;
  reason: string;
}

export interface ParsedJobList {
  jobs: JobRef[];
  issues: JobListIssue[];
}

export function parseJobList(content: string): ParsedJobList {
  const jobs: JobRef[] = [];
  const issues: JobListIssue[] = [];

  content.split('\n').forEach((rawLine, index) => {
    const line = rawLine.replace(/\r$/, '').trim();
    if (line.length === 0 || line.startsWith('#')) {
      return;
    }

    // The handle may itself contain commas, so only the first one separates
    const separator = line.indexOf(',');
    const name = separator === -1 ? line : line.slice(0, separator).trim();
    const handle = separator === -1 ? '' : line.slice(separator + 1).trim();

    if (!name) {
      issues.push({ line: index + 1, content: line, reason: 'missing report name' });
      return;
    }
    if (!handle) {
      issues.push({ line: index + 1, content: line, reason: 'missing report handle' });
      return;
    }

    jobs.push({ name, handle });
  });

  return { jobs, issues };
}

export async function readJobList(filePath: string): Promise<ParsedJobList> {
  const content = await readFile(filePath, 'utf-8');
  return parseJobList(content);
}
