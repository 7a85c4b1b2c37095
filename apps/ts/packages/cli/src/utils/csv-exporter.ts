import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { type PerspectiveGroup, type PerspectiveSummary, sanitizeFilename } from '@flexreport/shared';
import { PERSPECTIVES_FILE } from './constants.js';

/**
 * Writes perspective exports as header-less CSV, one record per line
 */
export class CsvExporter {
  private readonly outputDir: string;
  /** Lower-cased names already written, so case-insensitive filesystems cannot clash either */
  private readonly usedNames = new Set<string>([PERSPECTIVES_FILE.toLowerCase()]);

  constructor(outputDir = '.') {
    this.outputDir = outputDir;
  }

  /**
   * File name for a perspective's groups. A name already taken in this export
   * gets the perspective id appended, then a counter.
   */
  groupFileName(perspective: PerspectiveSummary): string {
    const base = sanitizeFilename(perspective.name);
    const withId = `${base}_${sanitizeFilename(perspective.id)}`;
    let filename = `${base}.csv`;
    for (let n = 1; this.usedNames.has(filename.toLowerCase()); n++) {
      filename = n === 1 ? `${withId}.csv` : `${withId}_${n}.csv`;
    }
    this.usedNames.add(filename.toLowerCase());
    return filename;
  }

  private escapeCSV(value: unknown): string {
    if (value === null || value === undefined) return '';
    const str = String(value);
    if (str.includes(',') || str.includes('"') || str.includes('\n')) {
      return `"${str.replace(/"/g, '""')}"`;
    }
    return str;
  }

  /**
   * `id,name` for every perspective
   */
  async exportPerspectives(perspectives: PerspectiveSummary[]): Promise<string> {
    return this.writeCSV(
      perspectives.map((perspective) => [perspective.id, perspective.name]),
      PERSPECTIVES_FILE
    );
  }

  /**
   * `ref_id,name` for every group, in a file named after the perspective
   */
  async exportGroups(perspective: PerspectiveSummary, groups: PerspectiveGroup[]): Promise<string> {
    return this.writeCSV(
      groups.map((group) => [group.refId, group.name]),
      this.groupFileName(perspective)
    );
  }

  private async writeCSV(rows: unknown[][], filename: string): Promise<string> {
    const csvContent = rows.map((row) => `${row.map((cell) => this.escapeCSV(cell)).join(',')}\n`).join('');

    await mkdir(this.outputDir, { recursive: true });
    const filepath = path.join(this.outputDir, filename);
    await writeFile(filepath, csvContent, 'utf8');
    return filepath;
  }
}
