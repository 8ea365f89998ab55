/**
 * Error types
 *
 * Fatal errors (config, auth, fetch, request, cancellation) abort a run and
 * surface at the CLI boundary. EnrichError is the one non-fatal kind: the
 * dispatcher records it against a single record and carries on.
 */

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'AUTH_FAILED'
  | 'FETCH_FAILED'
  | 'ENRICH_FAILED'
  | 'REQUEST_FAILED'
  | 'CANCELLED';

export class M365AuditError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'M365AuditError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ConfigError extends M365AuditError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class AuthError extends M365AuditError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTH_FAILED', `Authentication failed: ${message}`, options);
    this.name = 'AuthError';
  }
}

export type FetchFailure =
  | { kind: 'Unauthorized'; body: string }
  | { kind: 'RemoteError'; status: number; body: string }
  | { kind: 'DecodeError'; detail: string }
  | { kind: 'PageLimit'; maxPages: number };

export class FetchError extends M365AuditError {
  public readonly failure: FetchFailure;
  public readonly url: string;

  constructor(url: string, failure: FetchFailure, options?: { cause?: unknown }) {
    super('FETCH_FAILED', describeFetchFailure(url, failure), options);
    this.name = 'FetchError';
    this.url = url;
    this.failure = failure;
  }

  get kind(): FetchFailure['kind'] {
    return this.failure.kind;
  }
}

function describeFetchFailure(url: string, failure: FetchFailure): string {
  switch (failure.kind) {
    case 'Unauthorized':
      return `Unauthorized fetching ${url}: ${failure.body}`;
    case 'RemoteError':
      return `HTTP ${failure.status} fetching ${url}: ${failure.body}`;
    case 'DecodeError':
      return `Could not decode page from ${url}: ${failure.detail}`;
    case 'PageLimit':
      return `Stopped after ${failure.maxPages} pages at ${url}; result set would be incomplete`;
  }
}

export class EnrichError extends M365AuditError {
  public readonly key: string;
  public readonly status?: number;
  public readonly attempts: number;

  constructor(key: string, message: string, details: { status?: number; attempts: number; cause?: unknown }) {
    super('ENRICH_FAILED', message, { cause: details.cause });
    this.name = 'EnrichError';
    this.key = key;
    this.status = details.status;
    this.attempts = details.attempts;
  }
}

export class RequestError extends M365AuditError {
  public readonly status: number;
  public readonly body: string;

  constructor(action: string, status: number, body: string) {
    super('REQUEST_FAILED', `${action} failed: ${status} - ${body}`);
    this.name = 'RequestError';
    this.status = status;
    this.body = body;
  }
}

export class CancelledError extends M365AuditError {
  constructor(phase: string) {
    super('CANCELLED', `Cancelled during ${phase}`);
    this.name = 'CancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
