/**
 * Shared mailboxes holding directory roles
 * Walks every activated directory role and its members, then checks
 * each member user's mailbox purpose.
 */

import { GraphTransport } from '../graph';
import { AuditDefinition } from '../pipeline';
import { PageOptions, fetchAll } from '../pager';
import { directoryObjectSchema, directoryRoleSchema } from '../schemas';
import { MailboxPurpose, fetchMailboxPurpose, isSharedPurpose } from './mailbox';
import { logger } from '../../utils/logger';

export const USER_ODATA_TYPE = '#microsoft.graph.user';
export const DIRECTORY_ROLES_URL = '/directoryRoles?$select=id,displayName';

export interface RoleMember {
  id: string;
  odataType: string | null;
  displayName: string | null;
  userPrincipalName: string | null;
  roles: readonly string[];
}

export interface PrivilegedSharedMailbox {
  userPrincipalName: string;
  displayName: string | null;
  roles: string[];
}

export function roleMembersUrl(roleId: string): string {
  return `/directoryRoles/${encodeURIComponent(roleId)}/members`;
}

/**
 * Fetch every role, then every role's members, one request at a time.
 * Members that hold several roles are merged, keeping first-seen order.
 */
export async function collectRoleMembers(
  transport: GraphTransport,
  options: PageOptions
): Promise<RoleMember[]> {
  const roles = await fetchAll(transport, DIRECTORY_ROLES_URL, directoryRoleSchema, options);
  logger.info(`Fetched ${roles.length} directory roles`);

  const members = new Map<string, { member: Omit<RoleMember, 'roles'>; roles: string[] }>();

  for (const role of roles) {
    const roleMembers = await fetchAll(transport, roleMembersUrl(role.id), directoryObjectSchema, options);
    logger.debug(`Role ${role.displayName} (${role.id}): ${roleMembers.length} member(s)`);

    for (const object of roleMembers) {
      const existing = members.get(object.id);
      if (existing) {
        existing.roles.push(role.displayName);
        continue;
      }
      members.set(object.id, {
        member: {
          id: object.id,
          odataType: object['@odata.type'] ?? null,
          displayName: object.displayName ?? null,
          userPrincipalName: object.userPrincipalName ?? null,
        },
        roles: [role.displayName],
      });
    }
  }

  return Array.from(members.values(), ({ member, roles: held }) =>
    Object.freeze({ ...member, roles: Object.freeze([...held]) })
  );
}

export const adminRolesAudit: AuditDefinition<RoleMember, MailboxPurpose, PrivilegedSharedMailbox> = {
  name: 'admin-roles',
  description: 'Shared mailboxes that are members of a directory role',

  collect: collectRoleMembers,

  keyOf: (member) => member.id,

  scopeOf: (member) => member.userPrincipalName ?? member.id,

  eligible: (member) => member.odataType === USER_ODATA_TYPE && !!member.userPrincipalName,

  enrich: (transport, member, signal) =>
    fetchMailboxPurpose(transport, member.userPrincipalName ?? member.id, signal),

  predicate: (_member, mailbox) => isSharedPurpose(mailbox.userPurpose),

  project: (member) => ({
    userPrincipalName: member.userPrincipalName ?? member.id,
    displayName: member.displayName,
    roles: [...member.roles],
  }),
};
