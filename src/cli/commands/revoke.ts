/**
 * Session and MFA revocation CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { resetMfaRegistrations, revokeSessions } from '../../core/actions';
import { AUTH_METHOD_COLLECTIONS } from '../../utils/constants';
import { prepare, runAction } from '../context';

interface UserOptions {
  user: string;
}

interface MfaOptions extends UserOptions {
  allMethods?: boolean;
}

export const revokeCommands = new Command('revoke')
  .description('Revoke sign-in sessions or MFA registrations');

revokeCommands
  .command('sessions')
  .description('Invalidate every refresh token issued to a user')
  .requiredOption('-u, --user <upn>', 'User principal name')
  .action((options: UserOptions, command: Command) =>
    runAction(async () => {
      const env = prepare(command);
      const spinner = ora(`Revoking sessions for ${options.user}...`).start();

      try {
        const client = await env.connect();
        await revokeSessions(client, options.user);
        spinner.succeed(`Sessions revoked for ${options.user}`);
      } catch (error) {
        spinner.fail(`Could not revoke sessions for ${options.user}`);
        throw error;
      }
    })
  );

revokeCommands
  .command('mfa')
  .description('Delete a user\'s authenticator registrations so they must register again')
  .requiredOption('-u, --user <upn>', 'User principal name')
  .option('-a, --all-methods', 'Delete every deletable method, not only software OATH tokens')
  .action((options: MfaOptions, command: Command) =>
    runAction(async () => {
      const env = prepare(command);
      const spinner = ora(`Resetting MFA for ${options.user}...`).start();

      try {
        const client = await env.connect();
        const result = await resetMfaRegistrations(client, options.user, {
          methodTypes: options.allMethods ? Object.keys(AUTH_METHOD_COLLECTIONS) : undefined,
          pageOptions: { signal: env.signal, maxPages: env.config.audit.maxPages },
        });

        spinner.succeed(`Deleted ${result.deleted.length} method(s) for ${options.user}`);
        for (const method of result.deleted) {
          console.log(`  ${chalk.green('✓')} ${method['@odata.type']} ${chalk.dim(method.id)}`);
        }
        for (const method of result.skipped) {
          console.log(`  ${chalk.dim('-')} ${chalk.dim(`${method['@odata.type']} ${method.id} (kept)`)}`);
        }
      } catch (error) {
        spinner.fail(`MFA reset failed for ${options.user}`);
        throw error;
      }
    })
  );
