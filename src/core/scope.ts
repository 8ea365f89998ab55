/**
 * Audit scope filters
 * Glob patterns over record keys (e.g. "*@contoso.com") that narrow
 * which records are worth enriching.
 */

import { minimatch } from 'minimatch';

export interface ScopeFilters {
  include?: string[];
  exclude?: string[];
}

/**
 * Check if a key matches the scope filters
 */
export function inScope(key: string, filters?: ScopeFilters): boolean {
  if (!filters) return true;

  const subject = key.toLowerCase();

  // Check include patterns
  if (filters.include && filters.include.length > 0) {
    const matches = filters.include.some((pattern) =>
      minimatch(subject, pattern.toLowerCase(), { dot: true })
    );
    if (!matches) return false;
  }

  // Check exclude patterns
  if (filters.exclude && filters.exclude.length > 0) {
    const excluded = filters.exclude.some((pattern) =>
      minimatch(subject, pattern.toLowerCase(), { dot: true })
    );
    if (excluded) return false;
  }

  return true;
}
