/**
 * Core module exports
 */

export { AuthManager, authManager } from './auth';
export { GraphClient, expectSuccess, userPath } from './graph';
export { loadConfig, loadEnvFile, validateAzureConfig } from './config';
export { paginate, fetchAll, fetchPage } from './pager';
export { dispatch, EnrichmentMap, EnrichHttpError } from './dispatcher';
export { aggregate } from './aggregator';
export { runAudit } from './pipeline';
export { inScope } from './scope';
export * from './audits';
export * from './actions';
export type { GraphTransport } from './graph';
export type { TokenClient, TokenClientFactory, TokenResult } from './auth';
export type { AuditOverrides } from './config';
export type { PageOptions, ItemSchema } from './pager';
export type { DispatchOptions, DispatchResult } from './dispatcher';
export type { AggregateOptions } from './aggregator';
export type { AuditDefinition, AuditContext } from './pipeline';
export type { ScopeFilters } from './scope';
