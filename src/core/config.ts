/**
 * Configuration
 * Loads tenant credentials and tuning knobs from the environment (.env)
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { AppConfig, AuditOptions, AzureConfig } from '../types';
import { DEFAULT_AUDIT_OPTIONS, ENV, GRAPH_API } from '../utils/constants';
import { ConfigError } from '../utils/errors';
import { logger } from '../utils/logger';

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type Env = Record<string, string | undefined>;

export interface AuditOverrides {
  concurrency?: number;
  maxRetries?: number;
}

/**
 * Load a .env file into process.env. An explicit path must exist;
 * the default ./.env is optional.
 */
export function loadEnvFile(envFile?: string): void {
  const target = envFile ? path.resolve(envFile) : path.join(process.cwd(), '.env');

  if (!fs.existsSync(target)) {
    if (envFile) {
      throw new ConfigError([`Env file not found: ${target}`]);
    }
    logger.debug(`No .env file at ${target}; using process environment`);
    return;
  }

  const result = dotenv.config({ path: target });
  if (result.error) {
    throw new ConfigError([`Failed to load ${target}: ${result.error.message}`]);
  }
  logger.debug(`.env file loaded from ${target}`);
}

/**
 * Validate tenant Azure credentials
 */
export function validateAzureConfig(azure: Partial<AzureConfig>): string[] {
  const errors: string[] = [];

  if (!azure.tenantId) {
    errors.push(`${ENV.TENANT_ID} is not set`);
  } else if (!GUID_PATTERN.test(azure.tenantId)) {
    errors.push(`${ENV.TENANT_ID} must be a GUID`);
  }

  if (!azure.clientId) {
    errors.push(`${ENV.CLIENT_ID} is not set`);
  } else if (!GUID_PATTERN.test(azure.clientId)) {
    errors.push(`${ENV.CLIENT_ID} must be a GUID`);
  }

  if (!azure.clientSecret) {
    errors.push(`${ENV.CLIENT_SECRET} is not set`);
  }

  return errors;
}

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number,
  errors: string[]
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return checkInteger(name, Number(raw), min, max, errors) ?? fallback;
}

function checkInteger(
  name: string,
  value: number,
  min: number,
  max: number,
  errors: string[]
): number | undefined {
  if (!Number.isInteger(value) || value < min || value > max) {
    errors.push(`${name} must be an integer between ${min} and ${max}`);
    return undefined;
  }
  return value;
}

/**
 * Build the application configuration from an environment map.
 * Every problem is collected before failing.
 */
export function loadConfig(env: Env = process.env, overrides: AuditOverrides = {}): AppConfig {
  const errors: string[] = [];

  const azure = {
    tenantId: env[ENV.TENANT_ID]?.trim(),
    clientId: env[ENV.CLIENT_ID]?.trim(),
    clientSecret: env[ENV.CLIENT_SECRET],
  };
  errors.push(...validateAzureConfig(azure));

  let concurrency = readInteger(
    env,
    ENV.CONCURRENCY,
    DEFAULT_AUDIT_OPTIONS.concurrency,
    1,
    DEFAULT_AUDIT_OPTIONS.maxConcurrency,
    errors
  );
  if (overrides.concurrency !== undefined) {
    concurrency =
      checkInteger('--concurrency', overrides.concurrency, 1, DEFAULT_AUDIT_OPTIONS.maxConcurrency, errors) ??
      concurrency;
  }

  let maxRetries = readInteger(
    env,
    ENV.MAX_RETRIES,
    DEFAULT_AUDIT_OPTIONS.maxRetries,
    0,
    DEFAULT_AUDIT_OPTIONS.maxRetriesLimit,
    errors
  );
  if (overrides.maxRetries !== undefined) {
    maxRetries =
      checkInteger('--retries', overrides.maxRetries, 0, DEFAULT_AUDIT_OPTIONS.maxRetriesLimit, errors) ??
      maxRetries;
  }

  const retryDelayMs = readInteger(
    env,
    ENV.RETRY_DELAY_MS,
    DEFAULT_AUDIT_OPTIONS.retryDelayMs,
    0,
    DEFAULT_AUDIT_OPTIONS.maxRetryDelayMs,
    errors
  );

  const graphBaseUrl = (env[ENV.GRAPH_BASE_URL] || GRAPH_API.BASE_URL).replace(/\/+$/, '');
  if (!/^https:\/\/[^/]+/.test(graphBaseUrl)) {
    errors.push(`${ENV.GRAPH_BASE_URL} must be an https URL`);
  }

  if (errors.length > 0 || !azure.tenantId || !azure.clientId || !azure.clientSecret) {
    throw new ConfigError(errors);
  }

  const audit: AuditOptions = {
    concurrency,
    maxRetries,
    retryDelayMs,
    maxRetryDelayMs: DEFAULT_AUDIT_OPTIONS.maxRetryDelayMs,
    maxPages: DEFAULT_AUDIT_OPTIONS.maxPages,
  };

  return {
    azure: {
      tenantId: azure.tenantId,
      clientId: azure.clientId,
      clientSecret: azure.clientSecret,
    },
    graphBaseUrl,
    audit,
  };
}
