/**
 * Shared CLI plumbing: verbosity, configuration, cancellation, error exit
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { AppConfig, CLIContext } from '../types';
import { AuditOverrides, loadConfig, loadEnvFile } from '../core/config';
import { GraphClient } from '../core/graph';
import { authManager } from '../core/auth';
import { M365AuditError, errorMessage } from '../utils/errors';
import { enableFileLogging, logger, resolveVerbosity, setLogLevel } from '../utils/logger';

export interface CommandEnvironment {
  config: AppConfig;
  signal: AbortSignal;
  connect: () => Promise<GraphClient>;
}

type GlobalFlags = {
  envFile?: string;
  verbose?: boolean;
  info?: boolean;
  debug?: boolean;
};

export function globalOptions(command: Command): CLIContext {
  const opts = command.optsWithGlobals<GlobalFlags>();
  return {
    envFile: opts.envFile,
    verbose: opts.verbose === true,
    info: opts.info === true,
    debug: opts.debug === true,
  };
}

/**
 * Apply global flags, load .env and configuration, and arm SIGINT
 */
export function prepare(command: Command, overrides: AuditOverrides = {}): CommandEnvironment {
  const globals = globalOptions(command);
  setLogLevel(resolveVerbosity(globals));
  enableFileLogging();

  loadEnvFile(globals.envFile);
  const config = loadConfig(process.env, overrides);
  logger.debug(`Tenant ${config.azure.tenantId}, client ${config.azure.clientId}, graph ${config.graphBaseUrl}`);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted; finishing in-flight requests');
    controller.abort();
  });

  return {
    config,
    signal: controller.signal,
    connect: () => GraphClient.forTenant(config.azure, config.graphBaseUrl, authManager),
  };
}

export function parseInteger(name: string) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
      throw new InvalidArgumentError(`${name} must be an integer, got "${value}"`);
    }
    return parsed;
  };
}

/**
 * Run a command body: any error is printed and the process exits 1
 */
export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    const code = error instanceof M365AuditError ? ` [${error.code}]` : '';
    logger.error(`Command failed${code}: ${errorMessage(error)}`);
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}
