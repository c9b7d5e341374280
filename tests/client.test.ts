import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { apiBaseUrl, authApiV2, DuoClient, type DuoEndpoints } from '../src/duo/client.js';
import { FetchTransport } from '../src/duo/transport.js';
import { TransportError } from '../src/duo/errors.js';
import type { DuoConfig, DuoTransport } from '../src/duo/types.js';

const config: DuoConfig = {
  apiHost: 'api-test.example.com',
  integrationKey: 'DITESTKEY',
  secretKey: 'test-secret',
  timeoutMs: 1000,
};

function fakeTransport(body = '{}') {
  return {
    sendUnauthenticatedGet: vi.fn<DuoTransport['sendUnauthenticatedGet']>().mockResolvedValue(body),
    sendSignedPost: vi.fn<DuoTransport['sendSignedPost']>().mockResolvedValue(body),
  };
}

describe('apiBaseUrl', () => {
  it('should prefix bare hosts with https', () => {
    expect(apiBaseUrl('api-test.example.com')).toBe('https://api-test.example.com');
  });

  it('should keep an explicit scheme', () => {
    expect(apiBaseUrl('http://localhost:9000')).toBe('http://localhost:9000');
  });

  it('should strip trailing slashes', () => {
    expect(apiBaseUrl('https://api-test.example.com/')).toBe('https://api-test.example.com');
  });
});

describe('DuoClient', () => {
  it('should ping the health endpoint without signing', async () => {
    const transport = fakeTransport('{"stat":"OK","response":"pong"}');
    const client = new DuoClient(config, transport);

    const body = await client.ping();

    expect(body).toBe('{"stat":"OK","response":"pong"}');
    expect(transport.sendUnauthenticatedGet).toHaveBeenCalledWith(
      'https://api-test.example.com/rest/v1/ping'
    );
    expect(transport.sendSignedPost).not.toHaveBeenCalled();
  });

  it('should send a signed pre-auth POST with the username', async () => {
    const transport = fakeTransport();
    const client = new DuoClient(config, transport);

    await client.preAuth('alice');

    expect(transport.sendSignedPost).toHaveBeenCalledWith(
      'https://api-test.example.com/auth/v2/preauth',
      { username: 'alice' },
      'DITESTKEY',
      'test-secret'
    );
  });

  it('should build requests from the endpoints chosen at construction', async () => {
    const transport = fakeTransport();
    const endpoints: DuoEndpoints = {
      buildPingRequest: (base) => ({ method: 'GET', url: `${base}/custom/ping`, params: {} }),
      buildPreAuthRequest: (base, username) => ({
        method: 'POST',
        url: `${base}/custom/preauth`,
        params: { user_id: username },
      }),
    };
    const client = new DuoClient(config, transport, endpoints);

    await client.ping();
    await client.preAuth('alice');

    expect(transport.sendUnauthenticatedGet).toHaveBeenCalledWith(
      'https://api-test.example.com/custom/ping'
    );
    expect(transport.sendSignedPost).toHaveBeenCalledWith(
      'https://api-test.example.com/custom/preauth',
      { user_id: 'alice' },
      'DITESTKEY',
      'test-secret'
    );
  });

  it('should not retry when the transport fails', async () => {
    const transport = fakeTransport();
    transport.sendSignedPost.mockRejectedValue(new TransportError('down', 'x'));
    const client = new DuoClient(config, transport);

    await expect(client.preAuth('alice')).rejects.toThrow('down');
    expect(transport.sendSignedPost).toHaveBeenCalledTimes(1);
  });

  it('should expose the v2 auth API paths by default', () => {
    expect(authApiV2.buildPreAuthRequest('https://h', 'bob')).toEqual({
      method: 'POST',
      url: 'https://h/auth/v2/preauth',
      params: { username: 'bob' },
    });
  });
});

describe('FetchTransport', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return the body of an unauthenticated GET', async () => {
    fetchMock.mockResolvedValue(new Response('{"stat":"OK","response":"pong"}'));
    const transport = new FetchTransport(1000);

    const body = await transport.sendUnauthenticatedGet('https://api-test.example.com/rest/v1/ping');

    expect(body).toBe('{"stat":"OK","response":"pong"}');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api-test.example.com/rest/v1/ping');
    expect(init?.method).toBe('GET');
  });

  it('should sign POST requests and send params as a form body', async () => {
    fetchMock.mockResolvedValue(new Response('{}'));
    const transport = new FetchTransport(1000);

    await transport.sendSignedPost(
      'https://api-test.example.com/auth/v2/preauth',
      { username: 'alice' },
      'DITESTKEY',
      'test-secret'
    );

    const [, init] = fetchMock.mock.calls[0];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('username=alice');
    const headers = new Headers(init?.headers);
    expect(headers.get('authorization')).toMatch(/^Basic /);
    expect(headers.get('content-type')).toBe('application/x-www-form-urlencoded');
    expect(headers.get('date')).not.toBeNull();
  });

  it('should return error bodies instead of throwing on non-2xx statuses', async () => {
    fetchMock.mockResolvedValue(
      new Response('{"stat":"FAIL","code":40301,"message":"Access forbidden"}', { status: 403 })
    );
    const transport = new FetchTransport(1000);

    const body = await transport.sendSignedPost(
      'https://api-test.example.com/auth/v2/preauth',
      { username: 'alice' },
      'DITESTKEY',
      'test-secret'
    );

    expect(body).toBe('{"stat":"FAIL","code":40301,"message":"Access forbidden"}');
  });

  it('should wrap network failures in a TransportError', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const transport = new FetchTransport(1000);

    await expect(
      transport.sendUnauthenticatedGet('https://api-test.example.com/rest/v1/ping')
    ).rejects.toBeInstanceOf(TransportError);
  });
});
