/**
 * Mail CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { inspectSpoofing, searchMessages, sendMail } from '../../core/actions';
import { prepare, runAction } from '../context';

interface SendOptions {
  email: string;
  subject: string;
  body: string;
  user: string;
}

interface SearchOptions {
  user: string;
  subject: string;
  spoofed?: boolean;
}

export const mailCommands = new Command('mail')
  .description('Send mail and inspect mailboxes');

mailCommands
  .command('send')
  .description('Send a plain-text message from a mailbox')
  .requiredOption('-e, --email <address>', 'Recipient address')
  .requiredOption('-s, --subject <subject>', 'Subject line')
  .requiredOption('-b, --body <text>', 'Message body')
  .requiredOption('-u, --user <upn>', 'Sending mailbox')
  .action((options: SendOptions, command: Command) =>
    runAction(async () => {
      const env = prepare(command);
      const spinner = ora(`Sending to ${options.email}...`).start();

      try {
        const client = await env.connect();
        await sendMail(client, {
          sender: options.user,
          recipient: options.email,
          subject: options.subject,
          body: options.body,
        });
        spinner.succeed(`Email sent to ${options.email}`);
      } catch (error) {
        spinner.fail('Email not sent');
        throw error;
      }
    })
  );

mailCommands
  .command('search')
  .description('Find messages in a mailbox by subject')
  .requiredOption('-u, --user <upn>', 'Mailbox to search')
  .requiredOption('-s, --subject <subject>', 'Subject to search for')
  .option('-p, --spoofed', 'Compare Sender and Reply-To against From for each hit')
  .action((options: SearchOptions, command: Command) =>
    runAction(async () => {
      const env = prepare(command);
      const client = await env.connect();
      const messages = await searchMessages(client, options.user, options.subject, {
        signal: env.signal,
        maxPages: env.config.audit.maxPages,
      });

      if (messages.length === 0) {
        console.log(chalk.yellow(`No messages matching "${options.subject}" in ${options.user}`));
        return;
      }

      console.log(chalk.bold(`\n${messages.length} message(s) in ${options.user}\n`));

      for (const message of messages) {
        const verdict = inspectSpoofing(message);
        console.log(`${chalk.bold(verdict.subject)}`);
        console.log(`  From:     ${verdict.from}`);

        if (!options.spoofed) {
          console.log(chalk.dim(`  Received: ${message.receivedDateTime ?? 'Unknown'}\n`));
          continue;
        }

        const senderMark = verdict.senderMatchesFrom ? chalk.green('matches From') : chalk.red('DIFFERS from From');
        console.log(`  Sender:   ${verdict.sender} (${senderMark})`);
        if (verdict.replyTo.length === 0) {
          console.log(chalk.dim('  Reply-To: none'));
        }
        for (const reply of verdict.replyTo) {
          const mark = reply.matchesFrom ? chalk.green('matches From') : chalk.red('DIFFERS from From');
          console.log(`  Reply-To: ${reply.address} (${mark})`);
        }
        console.log();
      }
    })
  );
