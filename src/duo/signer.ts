import { createHmac } from 'crypto';
import { SigningError } from './errors.js';
import type { DuoRequest, SignedRequest } from './types.js';

/**
 * RFC 3986 encoding, as the provider canonicalises parameters.
 * encodeURIComponent leaves !'()* untouched, so those are escaped by hand.
 */
export function encodeParam(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export function canonicalizeParams(params: Record<string, string>): string {
  return Object.keys(params)
    .sort()
    .map((key) => `${encodeParam(key)}=${encodeParam(params[key])}`)
    .join('&');
}

export function canonicalizeRequest(request: DuoRequest, date: string): string {
  const url = new URL(request.url);
  return [
    date,
    request.method.toUpperCase(),
    url.host.toLowerCase(),
    url.pathname,
    canonicalizeParams(request.params),
  ].join('\n');
}

/**
 * Sign a request with the integration/secret key pair.
 *
 * The signature is an HMAC-SHA1 of the canonical request (date, method, host,
 * path and sorted parameters), sent as HTTP basic credentials next to the Date
 * header it was computed over. Output is deterministic for the same request,
 * keys and date.
 */
export function signRequest(
  request: DuoRequest,
  integrationKey: string,
  secretKey: string,
  date: Date = new Date()
): SignedRequest {
  if (!integrationKey) {
    throw new SigningError('Integration key is empty');
  }
  if (!secretKey) {
    throw new SigningError('Secret key is empty');
  }

  const dateHeader = date.toUTCString();
  let canonical: string;
  try {
    canonical = canonicalizeRequest(request, dateHeader);
  } catch {
    throw new SigningError(`Cannot sign request for invalid URL: ${request.url}`);
  }

  const signature = createHmac('sha1', secretKey).update(canonical).digest('hex');
  const credentials = Buffer.from(`${integrationKey}:${signature}`).toString('base64');

  const headers: Record<string, string> = {
    Date: dateHeader,
    Authorization: `Basic ${credentials}`,
  };

  const encoded = canonicalizeParams(request.params);
  if (request.method === 'POST') {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    return { ...request, headers, body: encoded };
  }

  const url = encoded ? `${request.url}?${encoded}` : request.url;
  return { ...request, url, headers };
}
