import type pino from 'pino';

import type { ProxyDiscovery } from '../discovery/wpadDiscovery';
import { ProxySwitchError, ResolutionError } from '../errors';

import { ENV_LOOKUP_ORDER, readEnvValue } from './proxyKinds';
import { parseProxyTarget, resolvedFromValue, type ResolvedProxy } from './proxyTarget';

interface ProxyResolverOptions {
  discovery: ProxyDiscovery;
  logger: pino.Logger;
  defaultProxy?: string | undefined;
  env?: NodeJS.ProcessEnv;
}

export class ProxyResolver {
  private readonly env: NodeJS.ProcessEnv;

  public constructor(private readonly options: ProxyResolverOptions) {
    this.env = options.env ?? process.env;
  }

  /**
   * Picks the proxy to apply: explicit value, exported environment variables,
   * discovery candidates, then the configured default.
   */
  public async resolve(explicit?: string): Promise<ResolvedProxy> {
    if (explicit !== undefined) {
      return this.finish(resolvedFromValue(explicit, 'explicit'));
    }

    const fromEnv = this.fromEnvironment();
    if (fromEnv) return this.finish(fromEnv);

    if (!this.options.discovery.enabled) {
      return this.finish(this.fromFallback(new ResolutionError({ reason: 'none' })));
    }

    let candidates: string[];
    try {
      candidates = await this.options.discovery.discoverCandidates();
    } catch (error) {
      if (!(error instanceof ProxySwitchError)) throw error;
      this.options.logger.warn({ error: error.message }, 'proxy discovery failed');
      return this.finish(this.fromFallback(error));
    }

    let lastError: ResolutionError | undefined;
    for (const candidate of candidates) {
      if (parseProxyTarget(candidate)) {
        return this.finish(resolvedFromValue(candidate, 'discovery'));
      }
      lastError = new ResolutionError({ reason: 'unparseable', input: candidate });
    }

    return this.finish(
      this.fromFallback(
        lastError ??
          new ResolutionError({
            reason: 'none',
            message: 'No valid proxies discovered from WPAD response',
          }),
      ),
    );
  }

  private fromEnvironment(): ResolvedProxy | null {
    for (const kind of ENV_LOOKUP_ORDER) {
      const value = readEnvValue(this.env, kind);
      if (value !== undefined && parseProxyTarget(value)) {
        return resolvedFromValue(value, 'environment');
      }
    }
    return null;
  }

  private fromFallback(failure: ProxySwitchError): ResolvedProxy {
    const fallback = this.options.defaultProxy?.trim();
    if (!fallback) throw failure;

    if (!parseProxyTarget(fallback)) {
      throw new ResolutionError({
        reason: 'unparseable',
        input: fallback,
        message: `Failed to parse default proxy '${fallback}'`,
      });
    }

    return resolvedFromValue(fallback, 'fallback');
  }

  private finish(resolved: ResolvedProxy): ResolvedProxy {
    this.options.logger.info(
      { source: resolved.source, hostPort: resolved.hostPort },
      'proxy resolved',
    );
    return resolved;
  }
}
