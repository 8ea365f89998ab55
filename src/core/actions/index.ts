/**
 * Remediation and lookup tools built on the same Graph transport
 */

export { revokeSessions } from './sessions';
export { resetMfaRegistrations, listAuthenticationMethods, methodPath } from './mfa';
export { removeLicenses, getAssignedSkuIds, skuAvailability, shouldIncludeSku } from './licenses';
export { sendMail, searchMessages, inspectSpoofing, isValidEmail, buildSendMailPayload } from './mail';
export type { MfaResetOptions, MfaResetResult } from './mfa';
export type { SkuAvailability } from './licenses';
export type { OutgoingMail, SpoofingVerdict } from './mail';
