/**
 * Audit Pipeline
 * Orchestrates one audit run:
 * authenticating → fetching → enriching → aggregating → reported.
 * Each phase starts only after the previous one has fully completed.
 */

import { AuditOptions, AuditPhase, AuditReport } from '../types';
import { aggregate } from './aggregator';
import { dispatch } from './dispatcher';
import { GraphTransport } from './graph';
import { PageOptions } from './pager';
import { ScopeFilters, inScope } from './scope';
import { CancelledError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface AuditDefinition<T, V, R> {
  name: string;
  description: string;
  /** Materialize the full primary collection */
  collect(transport: GraphTransport, options: PageOptions): Promise<T[]>;
  keyOf(record: T): string;
  /** Value matched against --include/--exclude; defaults to keyOf */
  scopeOf?(record: T): string;
  eligible(record: T): boolean;
  enrich(transport: GraphTransport, record: T, signal?: AbortSignal): Promise<V>;
  predicate(record: T, value: V): boolean;
  project(record: T, value: V): R;
}

export interface AuditContext {
  connect: () => Promise<GraphTransport>;
  options: AuditOptions;
  scope?: ScopeFilters;
  signal?: AbortSignal;
  onPhase?: (phase: AuditPhase, detail?: string) => void;
  onProgress?: (completed: number, total: number) => void;
}

export async function runAudit<T, V, R>(
  definition: AuditDefinition<T, V, R>,
  context: AuditContext
): Promise<AuditReport<R>> {
  const { options, signal } = context;
  const phase = (name: AuditPhase, detail?: string) => {
    logger.info(`[${definition.name}] ${name}${detail ? `: ${detail}` : ''}`);
    context.onPhase?.(name, detail);
  };

  phase('authenticating');
  const transport = await context.connect();
  if (signal?.aborted) throw new CancelledError('authenticating');

  phase('fetching');
  const records = await definition.collect(transport, { signal, maxPages: options.maxPages });
  phase('fetching', `${records.length} record(s)`);

  phase('enriching');
  const { outcomes, dispatched, skipped } = await dispatch(records, {
    keyOf: (record) => definition.keyOf(record),
    eligible: (record) =>
      definition.eligible(record) &&
      inScope(definition.scopeOf?.(record) ?? definition.keyOf(record), context.scope),
    enrich: (record, taskSignal) => definition.enrich(transport, record, taskSignal),
    concurrency: options.concurrency,
    retry: {
      maxRetries: options.maxRetries,
      baseDelayMs: options.retryDelayMs,
      maxDelayMs: options.maxRetryDelayMs,
    },
    signal,
    onProgress: context.onProgress,
  });

  phase('aggregating');
  const report = aggregate(records, outcomes, {
    audit: definition.name,
    keyOf: (record) => definition.keyOf(record),
    predicate: (record, value) => definition.predicate(record, value),
    project: (record, value) => definition.project(record, value),
    dispatched,
    skipped,
  });

  phase('reported', `${report.matchCount} match(es), ${report.undetermined.length} undetermined`);
  return report;
}
