import { TransportError } from './errors.js';
import { signRequest } from './signer.js';
import type { DuoTransport, SignedRequest } from './types.js';

const USER_AGENT = 'duo-status-gate/1.0.0';

/**
 * Transport on top of the global fetch. Non-2xx statuses still resolve with
 * the body: the provider reports FAIL payloads with 4xx/5xx codes and the
 * classifier needs to see them.
 */
export class FetchTransport implements DuoTransport {
  private timeoutMs: number;

  constructor(timeoutMs: number) {
    this.timeoutMs = timeoutMs;
  }

  async sendUnauthenticatedGet(url: string): Promise<string> {
    return this.send(url, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  async sendSignedPost(
    url: string,
    params: Record<string, string>,
    integrationKey: string,
    secretKey: string
  ): Promise<string> {
    const signed: SignedRequest = signRequest({ method: 'POST', url, params }, integrationKey, secretKey);

    return this.send(signed.url, {
      method: signed.method,
      headers: { ...signed.headers, 'User-Agent': USER_AGENT },
      body: signed.body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  private async send(url: string, init: RequestInit): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Request to ${url} failed: ${reason}`, url, { cause: err });
    }

    try {
      return await response.text();
    } catch (err) {
      throw new TransportError(`Failed to read response body from ${url}`, url, { cause: err });
    }
  }
}
