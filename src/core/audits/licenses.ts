/**
 * Licensed shared mailboxes
 * Shared mailboxes do not need a license; any that hold one are flagged.
 */

import { GraphUser } from '../../types';
import { AuditDefinition } from '../pipeline';
import { fetchAll } from '../pager';
import { graphUserSchema } from '../schemas';
import { MailboxPurpose, fetchMailboxPurpose, isSharedPurpose } from './mailbox';

export interface LicensedSharedMailbox {
  userPrincipalName: string;
  licenseCount: number;
  skuIds: string[];
}

export const LICENSED_USERS_URL = '/users?$select=userPrincipalName,assignedLicenses';

export const licensesAudit: AuditDefinition<GraphUser, MailboxPurpose, LicensedSharedMailbox> = {
  name: 'licenses',
  description: 'Shared mailboxes that are assigned one or more licenses',

  collect: (transport, options) => fetchAll(transport, LICENSED_USERS_URL, graphUserSchema, options),

  keyOf: (user) => user.userPrincipalName,

  eligible: (user) => (user.assignedLicenses?.length ?? 0) > 0,

  enrich: (transport, user, signal) => fetchMailboxPurpose(transport, user.userPrincipalName, signal),

  predicate: (_user, mailbox) => isSharedPurpose(mailbox.userPurpose),

  project: (user) => ({
    userPrincipalName: user.userPrincipalName,
    licenseCount: user.assignedLicenses?.length ?? 0,
    skuIds: (user.assignedLicenses ?? []).map((license) => license.skuId),
  }),
};
