/**
 * Microsoft Graph API Client
 * Thin transport over the Graph SDK that hands back raw responses,
 * so callers decide how status codes and bodies are classified.
 */

import {
  AuthenticationHandler,
  Client,
  HTTPMessageHandler,
  RedirectHandler,
  ResponseType,
} from '@microsoft/microsoft-graph-client';
import 'isomorphic-fetch';
import { AzureConfig } from '../types';
import { GRAPH_API } from '../utils/constants';
import { RequestError } from '../utils/errors';
import { AuthManager, authManager } from './auth';
import { logger } from '../utils/logger';

/**
 * Minimal HTTP surface the audit pipeline and tools depend on
 */
export interface GraphTransport {
  get(pathOrUrl: string, headers?: Record<string, string>, signal?: AbortSignal): Promise<Response>;
  post(path: string, body: unknown): Promise<Response>;
  delete(path: string): Promise<Response>;
}

export class GraphClient implements GraphTransport {
  private client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  /**
   * Create a Graph client that authenticates every request with a fixed bearer token.
   * The chain has no RetryHandler; enrichment retries are the dispatcher's alone.
   */
  static withToken(accessToken: string, baseUrl: string = GRAPH_API.BASE_URL): GraphClient {
    const { host, version } = splitBaseUrl(baseUrl);

    const authentication = new AuthenticationHandler({ getAccessToken: async () => accessToken });
    const redirect = new RedirectHandler();
    authentication.setNext(redirect);
    redirect.setNext(new HTTPMessageHandler());

    const client = Client.initWithMiddleware({
      baseUrl: host,
      defaultVersion: version,
      middleware: authentication,
    });
    return new GraphClient(client);
  }

  /**
   * Create a Graph client for a tenant
   */
  static async forTenant(
    azure: AzureConfig,
    baseUrl: string = GRAPH_API.BASE_URL,
    auth: AuthManager = authManager
  ): Promise<GraphClient> {
    const token = await auth.getAccessToken(azure);
    return GraphClient.withToken(token, baseUrl);
  }

  async get(pathOrUrl: string, headers: Record<string, string> = {}, signal?: AbortSignal): Promise<Response> {
    logger.debug(`GET ${pathOrUrl}`);
    const request = this.client.api(pathOrUrl).headers(headers).responseType(ResponseType.RAW);
    if (signal) {
      request.option('signal', signal);
    }
    const response: Response = await request.get();
    logger.debug(`GET ${pathOrUrl} -> ${response.status}`);
    return response;
  }

  async post(path: string, body: unknown): Promise<Response> {
    logger.debug(`POST ${path}`);
    const response: Response = await this.client
      .api(path)
      .header('Content-Type', 'application/json')
      .responseType(ResponseType.RAW)
      .post(body);
    logger.debug(`POST ${path} -> ${response.status}`);
    return response;
  }

  async delete(path: string): Promise<Response> {
    logger.debug(`DELETE ${path}`);
    const response: Response = await this.client
      .api(path)
      .responseType(ResponseType.RAW)
      .delete();
    logger.debug(`DELETE ${path} -> ${response.status}`);
    return response;
  }
}

/**
 * Split "https://graph.microsoft.com/v1.0" into SDK host and version parts
 */
export function splitBaseUrl(baseUrl: string): { host: string; version: string } {
  const url = new URL(baseUrl);
  const version = url.pathname.replace(/^\/+|\/+$/g, '') || 'v1.0';
  return { host: url.origin, version };
}

/**
 * Build a Graph path with one encoded identity segment, e.g. userPath('a@b.com', 'mailboxSettings')
 */
export function userPath(userId: string, ...rest: string[]): string {
  return ['/users', encodeURIComponent(userId), ...rest].join('/');
}

/**
 * Any 2xx succeeds; anything else surfaces the response body verbatim
 */
export async function expectSuccess(response: Response, action: string): Promise<string> {
  const text = await response.text();
  if (!response.ok) {
    throw new RequestError(action, response.status, text);
  }
  return text;
}
