/**
 * Shared mailboxes that can still sign in
 * A shared mailbox should have sign-in blocked (accountEnabled = false).
 */

import { GraphUser } from '../../types';
import { AuditDefinition } from '../pipeline';
import { fetchAll } from '../pager';
import { graphUserSchema } from '../schemas';
import { MailboxPurpose, fetchMailboxPurpose, isSharedPurpose } from './mailbox';

export interface SignInEnabledSharedMailbox {
  userPrincipalName: string;
  displayName: string | null;
}

export const ENABLED_USERS_URL = '/users?$select=userPrincipalName,displayName,accountEnabled';

export const blockStatusAudit: AuditDefinition<GraphUser, MailboxPurpose, SignInEnabledSharedMailbox> = {
  name: 'block-status',
  description: 'Shared mailboxes whose sign-in is not blocked',

  collect: (transport, options) => fetchAll(transport, ENABLED_USERS_URL, graphUserSchema, options),

  keyOf: (user) => user.userPrincipalName,

  eligible: (user) => user.accountEnabled === true,

  enrich: (transport, user, signal) => fetchMailboxPurpose(transport, user.userPrincipalName, signal),

  predicate: (_user, mailbox) => isSharedPurpose(mailbox.userPurpose),

  project: (user) => ({
    userPrincipalName: user.userPrincipalName,
    displayName: user.displayName ?? null,
  }),
};
