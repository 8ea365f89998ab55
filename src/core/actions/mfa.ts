/**
 * MFA re-registration
 * Deletes a user's registered authentication methods so they have to
 * register again at next sign-in.
 */

import { AuthenticationMethod } from '../../types';
import { GraphTransport, expectSuccess, userPath } from '../graph';
import { PageOptions, fetchAll } from '../pager';
import { authenticationMethodSchema } from '../schemas';
import { AUTH_METHOD_COLLECTIONS, DEFAULT_MFA_METHOD_TYPES } from '../../utils/constants';
import { logger } from '../../utils/logger';

export interface MfaResetOptions {
  /** @odata.type values to delete; defaults to software OATH tokens */
  methodTypes?: string[];
  pageOptions?: PageOptions;
}

export interface MfaResetResult {
  deleted: AuthenticationMethod[];
  skipped: AuthenticationMethod[];
}

export function listAuthenticationMethods(
  transport: GraphTransport,
  userPrincipalName: string,
  options: PageOptions = {}
): Promise<AuthenticationMethod[]> {
  return fetchAll(
    transport,
    userPath(userPrincipalName, 'authentication', 'methods'),
    authenticationMethodSchema,
    options
  );
}

/**
 * Path of a deletable method, or null when Graph offers no delete for its type
 */
export function methodPath(userPrincipalName: string, method: AuthenticationMethod): string | null {
  const collection = AUTH_METHOD_COLLECTIONS[method['@odata.type']];
  if (!collection) return null;
  return userPath(userPrincipalName, 'authentication', collection, encodeURIComponent(method.id));
}

export async function resetMfaRegistrations(
  transport: GraphTransport,
  userPrincipalName: string,
  options: MfaResetOptions = {}
): Promise<MfaResetResult> {
  const selected = new Set(options.methodTypes ?? DEFAULT_MFA_METHOD_TYPES);
  const methods = await listAuthenticationMethods(transport, userPrincipalName, options.pageOptions);
  logger.info(`Found ${methods.length} authentication method(s) for ${userPrincipalName}`);

  const result: MfaResetResult = { deleted: [], skipped: [] };

  for (const method of methods) {
    const path = selected.has(method['@odata.type']) ? methodPath(userPrincipalName, method) : null;
    if (!path) {
      logger.debug(`Skipping ${method['@odata.type']} (${method.id})`);
      result.skipped.push(method);
      continue;
    }

    const response = await transport.delete(path);
    await expectSuccess(response, `Deleting authentication method ${method.id} for ${userPrincipalName}`);
    logger.info(`Deleted authentication method ${method.id} for ${userPrincipalName}`);
    result.deleted.push(method);
  }

  return result;
}
