/**
 * Token CLI command
 */

import { Command } from 'commander';
import ora from 'ora';
import { authManager } from '../../core/auth';
import { prepare, runAction } from '../context';

export const tokenCommand = new Command('token')
  .description('Acquire an app-only Graph access token and print it')
  .action((_options: Record<string, never>, command: Command) =>
    runAction(async () => {
      const env = prepare(command);
      const spinner = ora(`Authenticating to tenant ${env.config.azure.tenantId}...`).start();

      try {
        const token = await authManager.getAccessToken(env.config.azure);
        spinner.succeed('Authentication successful');
        console.log(token);
      } catch (error) {
        spinner.fail('Authentication failed - check credentials');
        throw error;
      }
    })
  );
