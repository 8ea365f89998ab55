/**
 * Response schemas for the Graph resources this tool reads.
 * Unknown properties are stripped; missing required ones fail decoding.
 */

import { z } from 'zod';
import type {
  AuthenticationMethod,
  DirectoryObject,
  DirectoryRole,
  GraphUser,
  MailboxSettings,
  MailMessage,
  SubscribedSku,
} from '../types';

export const graphUserSchema: z.ZodType<GraphUser, z.ZodTypeDef, unknown> = z.object({
  id: z.string().optional(),
  userPrincipalName: z.string(),
  displayName: z.string().nullish(),
  accountEnabled: z.boolean().nullish(),
  assignedLicenses: z
    .array(z.object({ skuId: z.string(), disabledPlans: z.array(z.string()).optional() }))
    .optional(),
});

export const mailboxSettingsSchema: z.ZodType<MailboxSettings, z.ZodTypeDef, unknown> = z.object({
  userPurpose: z.string().nullish(),
});

export const directoryRoleSchema: z.ZodType<DirectoryRole, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  displayName: z.string(),
  roleTemplateId: z.string().nullish(),
});

export const directoryObjectSchema: z.ZodType<DirectoryObject, z.ZodTypeDef, unknown> = z.object({
  '@odata.type': z.string().optional(),
  id: z.string(),
  displayName: z.string().nullish(),
  userPrincipalName: z.string().nullish(),
});

export const authenticationMethodSchema: z.ZodType<AuthenticationMethod, z.ZodTypeDef, unknown> =
  z.object({
    '@odata.type': z.string(),
    id: z.string(),
  });

const recipientSchema = z.object({
  emailAddress: z
    .object({ name: z.string().nullish(), address: z.string().nullish() })
    .nullish(),
});

export const mailMessageSchema: z.ZodType<MailMessage, z.ZodTypeDef, unknown> = z.object({
  id: z.string().optional(),
  subject: z.string().nullish(),
  from: recipientSchema.nullish(),
  sender: recipientSchema.nullish(),
  replyTo: z.array(recipientSchema).nullish(),
  receivedDateTime: z.string().nullish(),
});

export const subscribedSkuSchema: z.ZodType<SubscribedSku, z.ZodTypeDef, unknown> = z.object({
  skuId: z.string(),
  skuPartNumber: z.string(),
  consumedUnits: z.number(),
  prepaidUnits: z.object({
    enabled: z.number(),
    suspended: z.number().optional(),
    warning: z.number().optional(),
  }),
});

/**
 * Envelope of a Graph collection page
 */
export function pageSchema<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z.object({
    value: z.array(item),
    '@odata.nextLink': z.string().optional(),
  });
}

/**
 * Render the first few zod issues as one line
 */
export function describeIssues(error: z.ZodError, limit: number = 3): string {
  const issues = error.issues.slice(0, limit).map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
  const more = error.issues.length > limit ? ` (+${error.issues.length - limit} more)` : '';
  return issues.join('; ') + more;
}
