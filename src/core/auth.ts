/**
 * Azure AD Authentication
 * Client-credentials token acquisition for Microsoft Graph via MSAL
 */

import {
  ConfidentialClientApplication,
  Configuration,
  AuthenticationResult,
  ClientCredentialRequest,
  LogLevel,
} from '@azure/msal-node';
import { AzureConfig, TokenCache } from '../types';
import { GRAPH_API } from '../utils/constants';
import { AuthError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type TokenResult = Pick<AuthenticationResult, 'accessToken' | 'expiresOn'>;

/**
 * The slice of an MSAL confidential client this module relies on
 */
export interface TokenClient {
  acquireTokenByClientCredential(request: ClientCredentialRequest): Promise<TokenResult | null>;
}

export type TokenClientFactory = (azure: AzureConfig) => TokenClient;

function createMsalClient(azure: AzureConfig): TokenClient {
  const config: Configuration = {
    auth: {
      clientId: azure.clientId,
      clientSecret: azure.clientSecret,
      authority: `${GRAPH_API.AUTHORITY_HOST}/${azure.tenantId}`,
    },
    system: {
      loggerOptions: {
        loggerCallback: (level, message) => {
          if (level <= LogLevel.Warning) {
            logger.debug(`MSAL: ${message}`);
          }
        },
        piiLoggingEnabled: false,
        logLevel: LogLevel.Warning,
      },
    },
  };

  return new ConfidentialClientApplication(config);
}

export class AuthManager {
  private clients: Map<string, TokenClient> = new Map();
  private tokenCache: TokenCache = {};
  private createClient: TokenClientFactory;

  constructor(createClient: TokenClientFactory = createMsalClient) {
    this.createClient = createClient;
  }

  /**
   * Get or create MSAL client for a tenant
   */
  private getClient(azure: AzureConfig): TokenClient {
    const cacheKey = `${azure.tenantId}:${azure.clientId}`;

    const existing = this.clients.get(cacheKey);
    if (existing) {
      return existing;
    }

    const client = this.createClient(azure);
    this.clients.set(cacheKey, client);

    return client;
  }

  /**
   * Acquire access token using client credentials flow
   */
  async getAccessToken(azure: AzureConfig, scopes: string[] = GRAPH_API.SCOPES): Promise<string> {
    const cacheKey = `${azure.tenantId}:${azure.clientId}`;

    // Check cache first
    const cached = this.tokenCache[cacheKey];
    if (cached && cached.expiresAt > new Date()) {
      logger.debug(`Using cached token for tenant ${azure.tenantId}`);
      return cached.accessToken;
    }

    logger.debug(`Acquiring new token for tenant ${azure.tenantId}`);

    const client = this.getClient(azure);

    let result: TokenResult | null;
    try {
      result = await client.acquireTokenByClientCredential({ scopes });
    } catch (error) {
      logger.error(`Failed to acquire token for tenant ${azure.tenantId}: ${errorMessage(error)}`);
      throw new AuthError(errorMessage(error), { cause: error });
    }

    if (!result || !result.accessToken) {
      throw new AuthError('identity provider returned no access token');
    }

    // Cache the token
    const expiresAt = result.expiresOn || new Date(Date.now() + 3600 * 1000);
    this.tokenCache[cacheKey] = {
      accessToken: result.accessToken,
      expiresAt: new Date(expiresAt),
    };

    logger.info(`Acquired access token for tenant ${azure.tenantId} (expires: ${expiresAt.toISOString()})`);
    return result.accessToken;
  }

  /**
   * Test authentication for a tenant
   */
  async testAuth(azure: AzureConfig): Promise<boolean> {
    try {
      await this.getAccessToken(azure);
      return true;
    } catch (error) {
      logger.debug(`Authentication test failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Clear cached tokens and clients, for one tenant or all
   */
  clearCache(tenantId?: string): void {
    if (tenantId) {
      for (const key of Object.keys(this.tokenCache)) {
        if (key.startsWith(`${tenantId}:`)) {
          delete this.tokenCache[key];
        }
      }
      for (const key of this.clients.keys()) {
        if (key.startsWith(`${tenantId}:`)) {
          this.clients.delete(key);
        }
      }
    } else {
      this.tokenCache = {};
      this.clients.clear();
    }
  }
}

// Singleton instance
export const authManager = new AuthManager();
