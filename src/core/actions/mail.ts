/**
 * Mail: send a message, search a mailbox by subject, and check
 * messages for mismatched sender headers.
 */

import { MailMessage } from '../../types';
import { GraphTransport, expectSuccess, userPath } from '../graph';
import { PageOptions, fetchAll } from '../pager';
import { mailMessageSchema } from '../schemas';
import { EMAIL_PATTERN } from '../../utils/constants';
import { ConfigError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export interface OutgoingMail {
  sender: string;
  recipient: string;
  subject: string;
  body: string;
}

export function isValidEmail(address: string): boolean {
  return EMAIL_PATTERN.test(address);
}

export function buildSendMailPayload(mail: OutgoingMail) {
  return {
    message: {
      subject: mail.subject,
      body: {
        contentType: 'Text',
        content: mail.body,
      },
      toRecipients: [
        {
          emailAddress: {
            address: mail.recipient,
          },
        },
      ],
    },
    saveToSentItems: true,
  };
}

export async function sendMail(transport: GraphTransport, mail: OutgoingMail): Promise<void> {
  const invalid = [mail.sender, mail.recipient].filter((address) => !isValidEmail(address));
  if (invalid.length > 0) {
    throw new ConfigError(invalid.map((address) => `Invalid email: ${address}`));
  }

  const response = await transport.post(userPath(mail.sender, 'sendMail'), buildSendMailPayload(mail));
  await expectSuccess(response, `Sending mail to ${mail.recipient}`);
  logger.info(`Email sent to ${mail.recipient}`);
}

export function searchMessagesUrl(userPrincipalName: string, subject: string): string {
  const search = encodeURIComponent(`"subject:${subject.replace(/"/g, '')}"`);
  return `${userPath(userPrincipalName, 'messages')}?$search=${search}`;
}

export function searchMessages(
  transport: GraphTransport,
  userPrincipalName: string,
  subject: string,
  options: PageOptions = {}
): Promise<MailMessage[]> {
  return fetchAll(transport, searchMessagesUrl(userPrincipalName, subject), mailMessageSchema, {
    ...options,
    headers: { ...options.headers, ConsistencyLevel: 'eventual' },
  });
}

export interface SpoofingVerdict {
  subject: string;
  from: string;
  sender: string;
  senderMatchesFrom: boolean;
  replyTo: Array<{ address: string; matchesFrom: boolean }>;
}

const UNKNOWN = 'Unknown';

/**
 * Compare Sender and Reply-To against From for one message
 */
export function inspectSpoofing(message: MailMessage): SpoofingVerdict {
  const from = message.from?.emailAddress?.address ?? UNKNOWN;
  const sender = message.sender?.emailAddress?.address ?? UNKNOWN;

  const replyTo = (message.replyTo ?? []).map((recipient) => {
    const address = recipient.emailAddress?.address ?? UNKNOWN;
    return { address, matchesFrom: address === from };
  });

  return {
    subject: message.subject ?? UNKNOWN,
    from,
    sender,
    senderMatchesFrom: sender === from,
    replyTo,
  };
}
