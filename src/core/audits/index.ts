/**
 * Audit registry
 */

export { licensesAudit } from './licenses';
export { blockStatusAudit } from './block-status';
export { adminRolesAudit, collectRoleMembers } from './admin-roles';
export { fetchMailboxPurpose, isSharedPurpose } from './mailbox';
export type { LicensedSharedMailbox } from './licenses';
export type { SignInEnabledSharedMailbox } from './block-status';
export type { RoleMember, PrivilegedSharedMailbox } from './admin-roles';
export type { MailboxPurpose } from './mailbox';
