import type { Logger } from 'pino';
import { AccountStatusCache, type Clock } from './cache.js';
import { accountFor, createAccount, ResponseClassifier } from './classifier.js';
import { DuoClient, type DuoEndpoints } from './client.js';
import { FetchTransport } from './transport.js';
import type {
  CacheConfig,
  Classification,
  DuoConfig,
  DuoTransport,
  ResponseParser,
  UserAccount,
} from './types.js';

export type { AccountStatus, UserAccount, DuoConfig, CacheConfig } from './types.js';

export type ServiceLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export interface StatusServiceOptions {
  transport?: DuoTransport;
  endpoints?: DuoEndpoints;
  parser?: ResponseParser;
  clock?: Clock;
}

/**
 * Resolves MFA account status through a short-lived cache in front of the
 * provider. Neither `ping` nor `resolve` ever rejects.
 */
export class DuoStatusService {
  private client: DuoClient;
  private classifier: ResponseClassifier;
  private cache: AccountStatusCache;
  private logger: ServiceLogger;

  constructor(
    duoConfig: DuoConfig,
    cacheConfig: CacheConfig,
    logger: ServiceLogger,
    options: StatusServiceOptions = {}
  ) {
    const transport = options.transport ?? new FetchTransport(duoConfig.timeoutMs);
    this.client = new DuoClient(duoConfig, transport, options.endpoints);
    this.classifier = new ResponseClassifier(options.parser);
    this.cache = new AccountStatusCache(cacheConfig, options.clock);
    this.logger = logger;
  }

  async ping(): Promise<boolean> {
    this.logger.debug({ url: this.client.baseUrl }, 'Pinging provider');
    try {
      const body = await this.client.ping();
      const reachable = this.classifier.classifyPing(body);
      if (!reachable) {
        this.logger.warn({ response: body }, 'Could not ping provider, unexpected response');
      }
      return reachable;
    } catch (err) {
      this.logger.warn({ err }, 'Pinging provider failed');
      return false;
    }
  }

  async resolve(username: string): Promise<UserAccount> {
    const cached = this.cache.get(username);
    if (cached) {
      this.logger.debug({ username, status: cached.status }, 'Found cached account');
      return cached;
    }

    let account: UserAccount;
    try {
      this.logger.debug({ username }, 'Contacting provider for pre-auth status');
      const body = await this.client.preAuth(username);
      const classification = this.classifier.classifyPreAuth(body, username);
      this.logClassification(username, classification);
      account = accountFor(username, classification);
    } catch (err) {
      this.logger.warn({ err, username }, 'Reaching provider failed, marking it unavailable');
      account = createAccount(username, 'UNAVAILABLE');
    }

    // Failures are cached too, to bound provider load during outages
    this.cache.put(username, account);
    this.logger.debug({ username, status: account.status }, 'Fetched and cached account');
    return account;
  }

  cleanupExpired(): number {
    const deleted = this.cache.cleanupExpired();
    if (deleted > 0) {
      this.logger.info({ deleted }, 'Cleaned up expired account cache entries');
    }
    return deleted;
  }

  cacheSize(): number {
    return this.cache.size();
  }

  private logClassification(username: string, classification: Classification): void {
    switch (classification.kind) {
      case 'ok':
        return;
      case 'malformed':
        this.logger.warn(
          { username, reason: classification.reason },
          'Provider response was received in unknown format'
        );
        return;
      case 'server_error':
        this.logger.warn(
          { username, code: classification.code, message: classification.message },
          'Provider returned a server error, it will be considered unavailable'
        );
        return;
      case 'config_warning':
        this.logger.warn(
          {
            username,
            code: classification.code,
            message: classification.message,
            detail: classification.detail,
          },
          'Provider rejected the pre-auth request, check the integration configuration; provider is still considered available'
        );
        return;
    }
  }
}
