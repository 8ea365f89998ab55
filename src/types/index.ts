/**
 * m365audit Core Types
 */

import type { EnrichError } from '../utils/errors';

// ============================================================================
// Configuration
// ============================================================================

export interface AzureConfig {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface AuditOptions {
  concurrency: number;
  maxRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  maxPages: number;
}

export interface AppConfig {
  azure: AzureConfig;
  graphBaseUrl: string;
  audit: AuditOptions;
}

// ============================================================================
// Authentication
// ============================================================================

export interface AuthToken {
  accessToken: string;
  expiresAt: Date;
}

export interface TokenCache {
  [tenantId: string]: AuthToken;
}

// ============================================================================
// Pagination / Enrichment / Aggregation
// ============================================================================

export interface Page<T> {
  value: T[];
  nextLink?: string;
}

export type EnrichmentOutcome<V> =
  | { ok: true; value: V }
  | { ok: false; error: EnrichError };

export interface UndeterminedRecord {
  key: string;
  reason: string;
}

export interface AuditReport<R> {
  audit: string;
  matches: R[];
  matchCount: number;
  undetermined: UndeterminedRecord[];
  /** Primary records fetched */
  examined: number;
  /** Records that passed the pre-filter and were enriched */
  dispatched: number;
  /** Records the pre-filter excluded */
  skipped: number;
}

export type AuditPhase = 'authenticating' | 'fetching' | 'enriching' | 'aggregating' | 'reported';

// ============================================================================
// Microsoft Graph resources
// ============================================================================

export interface AssignedLicense {
  skuId: string;
  disabledPlans?: string[];
}

export interface GraphUser {
  id?: string;
  userPrincipalName: string;
  displayName?: string | null;
  accountEnabled?: boolean | null;
  assignedLicenses?: AssignedLicense[];
}

export interface MailboxSettings {
  userPurpose?: string | null;
}

export interface DirectoryRole {
  id: string;
  displayName: string;
  roleTemplateId?: string | null;
}

export interface DirectoryObject {
  '@odata.type'?: string;
  id: string;
  displayName?: string | null;
  userPrincipalName?: string | null;
}

export interface AuthenticationMethod {
  '@odata.type': string;
  id: string;
}

export interface EmailAddress {
  name?: string | null;
  address?: string | null;
}

export interface Recipient {
  emailAddress?: EmailAddress | null;
}

export interface MailMessage {
  id?: string;
  subject?: string | null;
  from?: Recipient | null;
  sender?: Recipient | null;
  replyTo?: Recipient[] | null;
  receivedDateTime?: string | null;
}

export interface SubscribedSku {
  skuId: string;
  skuPartNumber: string;
  consumedUnits: number;
  prepaidUnits: {
    enabled: number;
    suspended?: number;
    warning?: number;
  };
}

// ============================================================================
// CLI
// ============================================================================

export interface CLIContext {
  envFile?: string;
  verbose: boolean;
  info: boolean;
  debug: boolean;
}
