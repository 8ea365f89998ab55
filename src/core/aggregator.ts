/**
 * Result Aggregator
 * Pure join of the primary collection with its enrichment outcomes.
 */

import { AuditReport, UndeterminedRecord } from '../types';
import { EnrichmentMap } from './dispatcher';

export interface AggregateOptions<T, V, R> {
  audit: string;
  keyOf: (record: T) => string;
  predicate: (record: T, value: V) => boolean;
  project: (record: T, value: V) => R;
  dispatched: number;
  skipped: number;
}

/**
 * Walk records in discovery order. A record with no outcome (never
 * dispatched) does not match; a failed outcome is reported as
 * undetermined rather than as a non-match.
 */
export function aggregate<T, V, R>(
  records: readonly T[],
  outcomes: EnrichmentMap<V>,
  options: AggregateOptions<T, V, R>
): AuditReport<R> {
  const matches: R[] = [];
  const undetermined: UndeterminedRecord[] = [];
  const reported = new Set<string>();

  for (const record of records) {
    const key = options.keyOf(record);
    if (reported.has(key)) continue;

    const outcome = outcomes.get(key);
    if (!outcome) continue;
    reported.add(key);

    if (!outcome.ok) {
      undetermined.push({ key, reason: outcome.error.message });
      continue;
    }

    if (options.predicate(record, outcome.value)) {
      matches.push(options.project(record, outcome.value));
    }
  }

  return {
    audit: options.audit,
    matches,
    matchCount: matches.length,
    undetermined,
    examined: records.length,
    dispatched: options.dispatched,
    skipped: options.skipped,
  };
}
