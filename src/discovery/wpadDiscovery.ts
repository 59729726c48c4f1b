import type pino from 'pino';

import { DiscoveryError } from '../errors';

import { extractPacCandidates } from './pacCandidates';

export interface ProxyDiscovery {
  readonly enabled: boolean;
  /** Ordered candidate proxy strings; throws `DiscoveryError` when none. */
  discoverCandidates(): Promise<string[]>;
}

/** First candidate of `discovery`, the one the resolver would pick first. */
export async function detectBestProxy(discovery: ProxyDiscovery): Promise<string> {
  const [best] = await discovery.discoverCandidates();
  if (best === undefined) {
    throw new DiscoveryError({
      reason: 'no-candidates',
      message: 'No proxies found in WPAD response',
    });
  }
  return best;
}

interface WpadDiscoveryOptions {
  url: string;
  enabled: boolean;
  logger: pino.Logger;
  fetchFn?: typeof fetch;
}

export class WpadDiscovery implements ProxyDiscovery {
  private readonly fetchFn: typeof fetch;

  public constructor(private readonly options: WpadDiscoveryOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  public get enabled(): boolean {
    return this.options.enabled;
  }

  public async discoverCandidates(): Promise<string[]> {
    if (!this.options.enabled) {
      throw new DiscoveryError({
        reason: 'unavailable',
        message: 'WPAD proxy discovery is disabled in configuration',
      });
    }

    const document = await this.fetchDocument();
    const candidates = extractPacCandidates(document);

    if (candidates.length === 0) {
      throw new DiscoveryError({
        reason: 'no-candidates',
        message: 'No proxies found in WPAD response',
        details: { url: this.options.url },
      });
    }

    this.options.logger.debug({ url: this.options.url, candidates }, 'wpad candidates discovered');
    return candidates;
  }

  public async detectBestProxy(): Promise<string> {
    return detectBestProxy(this);
  }

  private async fetchDocument(): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(this.options.url, {
        method: 'GET',
        headers: {
          noproxy: '*',
        },
      });
    } catch (error) {
      throw new DiscoveryError({
        reason: 'unavailable',
        message: 'Failed to fetch WPAD document',
        details: {
          url: this.options.url,
          reason: error instanceof Error ? error.message : 'network error',
        },
        cause: error,
      });
    }

    if (!response.ok) {
      throw new DiscoveryError({
        reason: 'unavailable',
        message: `Failed to fetch WPAD document: HTTP ${response.status}`,
        details: {
          url: this.options.url,
          status: response.status,
          statusText: response.statusText,
        },
      });
    }

    try {
      return await response.text();
    } catch (error) {
      throw new DiscoveryError({
        reason: 'unavailable',
        message: 'Failed to read WPAD document',
        details: {
          url: this.options.url,
          reason: error instanceof Error ? error.message : 'network error',
        },
        cause: error,
      });
    }
  }
}
