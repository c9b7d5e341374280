import { z } from 'zod';
import type {
  AccountStatus,
  Classification,
  ProviderResultStatus,
  ResponseParser,
  UserAccount,
} from './types.js';

// Codes above this mean the provider itself is failing
export const SERVER_ERROR_CODE_THRESHOLD = 49999;

const PROVIDER_RESULTS: readonly ProviderResultStatus[] = ['AUTH', 'ALLOW', 'DENY', 'ENROLL'];

const PreAuthOkSchema = z.object({
  response: z.object({
    result: z.string(),
    status_msg: z
      .unknown()
      .refine((value) => value !== undefined, { message: 'Required' })
      .transform(asText),
    enroll_portal_url: z.string().optional(),
  }),
});

const FailSchema = z.object({
  code: z.union([z.number().transform(Math.trunc), z.string().regex(/^-?\d+$/).transform(Number)]),
  // Only logged, so any scalar is read as text
  message: z.unknown().transform(asText),
  message_detail: z.unknown().transform(asText),
});

export function createAccount(
  username: string,
  status: AccountStatus,
  message = '',
  enrollPortalUrl?: string
): UserAccount {
  const account: UserAccount =
    status === 'ENROLL' && enrollPortalUrl !== undefined
      ? { username, status, message, enrollPortalUrl }
      : { username, status, message };
  return Object.freeze(account);
}

/**
 * Bodies arrive form-urlencoded: '+' is a space and each run of %XX bytes is
 * read as UTF-8, invalid sequences becoming U+FFFD. Throws URIError on a '%'
 * that does not start an escape.
 */
export function decodeBody(raw: string): string {
  return raw.replace(/\+/g, ' ').replace(/(?:%[0-9A-Fa-f]{2})+|%/g, (run) => {
    if (run === '%') {
      throw new URIError('Malformed percent-escape in response body');
    }
    return Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8');
  });
}

/**
 * Text value of a scalar JSON node; objects, arrays and null read as ''.
 */
function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isProviderResult(value: string): value is ProviderResultStatus {
  return PROVIDER_RESULTS.some((result) => result === value);
}

export class ResponseClassifier {
  private parse: ResponseParser;

  constructor(parse: ResponseParser = JSON.parse) {
    this.parse = parse;
  }

  /**
   * Decode and parse a body into a JSON object. Returns an error string
   * instead of throwing.
   */
  private readTree(raw: string): { tree: Record<string, unknown> } | { error: string } {
    let tree: unknown;
    try {
      tree = this.parse(decodeBody(raw));
    } catch (err) {
      return { error: err instanceof Error ? err.message : String(err) };
    }
    if (!isObject(tree)) {
      return { error: 'Response is not a JSON object' };
    }
    return { tree };
  }

  classifyPing(raw: string): boolean {
    const read = this.readTree(raw);
    if ('error' in read) return false;

    const { tree } = read;
    if (!('stat' in tree) || !('response' in tree)) return false;

    return (
      asText(tree.stat).toLowerCase() === 'ok' && asText(tree.response).toLowerCase() === 'pong'
    );
  }

  classifyPreAuth(raw: string, username: string): Classification {
    const read = this.readTree(raw);
    if ('error' in read) {
      return { kind: 'malformed', reason: read.error };
    }

    const { tree } = read;
    if (!('stat' in tree)) {
      return { kind: 'malformed', reason: 'Response has no stat field' };
    }

    if (asText(tree.stat).toLowerCase() === 'ok') {
      const parsed = PreAuthOkSchema.safeParse(tree);
      if (!parsed.success) {
        return { kind: 'malformed', reason: describeIssues(parsed.error) };
      }

      const { result, status_msg, enroll_portal_url } = parsed.data.response;
      const status = result.toUpperCase();
      if (!isProviderResult(status)) {
        return { kind: 'malformed', reason: `Unknown pre-auth result: ${result}` };
      }

      if (status === 'ENROLL') {
        if (enroll_portal_url === undefined) {
          return { kind: 'malformed', reason: 'Enroll result without enroll_portal_url' };
        }
        return { kind: 'ok', account: createAccount(username, status, status_msg, enroll_portal_url) };
      }

      return { kind: 'ok', account: createAccount(username, status, status_msg) };
    }

    const parsed = FailSchema.safeParse(tree);
    if (!parsed.success) {
      return { kind: 'malformed', reason: describeIssues(parsed.error) };
    }

    const { code, message, message_detail } = parsed.data;
    if (code > SERVER_ERROR_CODE_THRESHOLD) {
      return { kind: 'server_error', code, message };
    }
    return { kind: 'config_warning', code, message, detail: message_detail };
  }
}

/**
 * Final account for a classification. A config warning leaves the default
 * AUTH status in place; every other failure makes the provider unavailable.
 */
export function accountFor(username: string, classification: Classification): UserAccount {
  switch (classification.kind) {
    case 'ok':
      return classification.account;
    case 'config_warning':
      return createAccount(username, 'AUTH');
    case 'server_error':
    case 'malformed':
      return createAccount(username, 'UNAVAILABLE');
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
