export const ACCOUNT_STATUSES = ['AUTH', 'ALLOW', 'DENY', 'ENROLL', 'UNAVAILABLE'] as const;

export type AccountStatus = (typeof ACCOUNT_STATUSES)[number];

/** Statuses the provider itself may report in a pre-auth `result`. */
export type ProviderResultStatus = Exclude<AccountStatus, 'UNAVAILABLE'>;

export interface UserAccount {
  readonly username: string;
  readonly status: AccountStatus;
  readonly message: string;
  readonly enrollPortalUrl?: string;
}

export interface DuoConfig {
  apiHost: string;
  integrationKey: string;
  secretKey: string;
  timeoutMs: number;
}

export interface CacheConfig {
  ttlSeconds: number;
  maxEntries: number;
}

export type HttpMethod = 'GET' | 'POST';

export interface DuoRequest {
  method: HttpMethod;
  url: string;
  params: Record<string, string>;
}

export interface SignedRequest extends DuoRequest {
  headers: Record<string, string>;
  body?: string;
}

/**
 * Outbound HTTP capability. Implementations resolve with the raw response body
 * and reject with a TransportError when the provider cannot be reached.
 */
export interface DuoTransport {
  sendUnauthenticatedGet(url: string): Promise<string>;
  sendSignedPost(
    url: string,
    params: Record<string, string>,
    integrationKey: string,
    secretKey: string
  ): Promise<string>;
}

export type ResponseParser = (text: string) => unknown;

export type Classification =
  | { kind: 'ok'; account: UserAccount }
  | { kind: 'malformed'; reason: string }
  | { kind: 'server_error'; code: number; message: string }
  | { kind: 'config_warning'; code: number; message: string; detail: string };
