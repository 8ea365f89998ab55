/**
 * Application Constants
 */

// Graph API
export const GRAPH_API = {
  BASE_URL: 'https://graph.microsoft.com/v1.0',
  SCOPES: ['https://graph.microsoft.com/.default'],
  AUTHORITY_HOST: 'https://login.microsoftonline.com',

  // Rate limiting
  MAX_RETRIES: 3,
  RETRY_DELAY_MS: 1000,
  MAX_RETRY_DELAY_MS: 30000,
};

// Default audit options
export const DEFAULT_AUDIT_OPTIONS = {
  concurrency: 8,
  maxConcurrency: 64,
  maxRetries: GRAPH_API.MAX_RETRIES,
  maxRetriesLimit: 10,
  retryDelayMs: GRAPH_API.RETRY_DELAY_MS,
  maxRetryDelayMs: GRAPH_API.MAX_RETRY_DELAY_MS,
  maxPages: 10000,
};

// Mailbox purpose that marks a shared mailbox
export const SHARED_MAILBOX_PURPOSE = 'shared';

// Authentication method @odata.type -> collection under /users/{id}/authentication
export const AUTH_METHOD_COLLECTIONS: Record<string, string> = {
  '#microsoft.graph.softwareOathAuthenticationMethod': 'softwareOathMethods',
  '#microsoft.graph.phoneAuthenticationMethod': 'phoneMethods',
  '#microsoft.graph.emailAuthenticationMethod': 'emailMethods',
  '#microsoft.graph.fido2AuthenticationMethod': 'fido2Methods',
  '#microsoft.graph.microsoftAuthenticatorAuthenticationMethod': 'microsoftAuthenticatorMethods',
  '#microsoft.graph.windowsHelloForBusinessAuthenticationMethod': 'windowsHelloForBusinessMethods',
  '#microsoft.graph.temporaryAccessPassAuthenticationMethod': 'temporaryAccessPassMethods',
};

export const DEFAULT_MFA_METHOD_TYPES = ['#microsoft.graph.softwareOathAuthenticationMethod'];

export const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

// Environment variable names
export const ENV = {
  TENANT_ID: 'TENANT_ID',
  CLIENT_ID: 'CLIENT_ID',
  CLIENT_SECRET: 'CLIENT_SECRET',
  GRAPH_BASE_URL: 'GRAPH_BASE_URL',
  CONCURRENCY: 'M365AUDIT_CONCURRENCY',
  MAX_RETRIES: 'M365AUDIT_MAX_RETRIES',
  RETRY_DELAY_MS: 'M365AUDIT_RETRY_DELAY_MS',
  LOG_DIR: 'M365AUDIT_LOG_DIR',
};
