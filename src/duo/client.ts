import type { DuoConfig, DuoRequest, DuoTransport } from './types.js';

const AUTH_API_VERSION = 2;

/**
 * Builds the outbound request shapes for one flavour of the provider API.
 */
export interface DuoEndpoints {
  buildPingRequest(baseUrl: string): DuoRequest;
  buildPreAuthRequest(baseUrl: string, username: string): DuoRequest;
}

export const authApiV2: DuoEndpoints = {
  buildPingRequest: (baseUrl) => ({
    method: 'GET',
    url: `${baseUrl}/rest/v1/ping`,
    params: {},
  }),
  buildPreAuthRequest: (baseUrl, username) => ({
    method: 'POST',
    url: `${baseUrl}/auth/v${AUTH_API_VERSION}/preauth`,
    params: { username },
  }),
};

/**
 * Configured hosts are usually bare hostnames like api-xxxx.duosecurity.com
 */
export function apiBaseUrl(apiHost: string): string {
  const base = apiHost.startsWith('http') ? apiHost : `https://${apiHost}`;
  return base.replace(/\/+$/, '');
}

export class DuoClient {
  private config: DuoConfig;
  private transport: DuoTransport;
  private endpoints: DuoEndpoints;

  constructor(config: DuoConfig, transport: DuoTransport, endpoints: DuoEndpoints = authApiV2) {
    this.config = config;
    this.transport = transport;
    this.endpoints = endpoints;
  }

  get baseUrl(): string {
    return apiBaseUrl(this.config.apiHost);
  }

  async ping(): Promise<string> {
    const request = this.endpoints.buildPingRequest(this.baseUrl);
    return this.transport.sendUnauthenticatedGet(request.url);
  }

  /** Single attempt, no retry. Transport and signing errors propagate. */
  async preAuth(username: string): Promise<string> {
    const request = this.endpoints.buildPreAuthRequest(this.baseUrl, username);
    return this.transport.sendSignedPost(
      request.url,
      request.params,
      this.config.integrationKey,
      this.config.secretKey
    );
  }
}
