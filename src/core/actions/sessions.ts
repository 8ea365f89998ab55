/**
 * Sign-in session revocation
 */

import { GraphTransport, expectSuccess, userPath } from '../graph';
import { logger } from '../../utils/logger';

/**
 * Invalidate every refresh token and session cookie issued to the user
 */
export async function revokeSessions(transport: GraphTransport, userPrincipalName: string): Promise<void> {
  const path = userPath(userPrincipalName, 'revokeSignInSessions');
  logger.debug(`Revoking sign-in sessions at ${path}`);

  const response = await transport.post(path, {});
  await expectSuccess(response, `Revoking sign-in sessions for ${userPrincipalName}`);

  logger.info(`Sign-in sessions revoked for ${userPrincipalName}`);
}
