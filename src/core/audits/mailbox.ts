/**
 * Mailbox settings lookup shared by the shared-mailbox audits
 */

import { GraphTransport, userPath } from '../graph';
import { mailboxSettingsSchema } from '../schemas';
import { EnrichHttpError } from '../dispatcher';
import { SHARED_MAILBOX_PURPOSE } from '../../utils/constants';
import { parseRetryAfter } from '../../utils/retry';

export interface MailboxPurpose {
  userPurpose: string | null;
}

/**
 * GET /users/{upn}/mailboxSettings and return its userPurpose
 */
export async function fetchMailboxPurpose(
  transport: GraphTransport,
  userPrincipalName: string,
  signal?: AbortSignal
): Promise<MailboxPurpose> {
  const response = await transport.get(userPath(userPrincipalName, 'mailboxSettings'), {}, signal);
  const text = await response.text();

  if (!response.ok) {
    throw new EnrichHttpError(
      response.status,
      text,
      parseRetryAfter(response.headers.get('Retry-After'))
    );
  }

  const settings = mailboxSettingsSchema.parse(JSON.parse(text));
  return { userPurpose: settings.userPurpose ?? null };
}

export function isSharedPurpose(purpose: string | null): boolean {
  return purpose !== null && purpose.toLowerCase() === SHARED_MAILBOX_PURPOSE;
}
