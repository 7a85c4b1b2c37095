/**
 * Derive a filesystem-safe name from a report or perspective name.
 * Whitespace and anything outside [A-Za-z0-9._-] become underscores.
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/\s/g, '_').replace(/[^A-Za-z0-9._-]/g, '_');
}
