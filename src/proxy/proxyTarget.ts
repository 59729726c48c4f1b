import { ResolutionError } from '../errors';

export type ProxySource = 'explicit' | 'environment' | 'discovery' | 'fallback';

export interface ResolvedProxy {
  readonly url: string;
  readonly hostPort: string;
  readonly source: ProxySource;
}

const DEFAULT_PORTS: Record<string, number> = {
  'http:': 80,
  'https:': 443,
  'ws:': 80,
  'wss:': 443,
  'ftp:': 21,
};

const DIRECTIVE_PATTERN = /^(?:PROXY|HTTPS|HTTP|SOCKS4|SOCKS5|SOCKS)(?:\s+|$)/i;
const DIRECT_PATTERN = /^DIRECT;?$/i;
const LEADING_NOISE = /^[\s;,'"]+/;
const TRAILING_NOISE = /[;,'"/]+$/;
const SPACED_IPV6_PORT = /^(\[[^\]]*\]):\s+/;

function hostPortFromUrl(input: string): string | null {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return null;
  }

  if (!url.hostname) return null;

  const port = url.port ? Number(url.port) : DEFAULT_PORTS[url.protocol];
  if (port === undefined) return null;

  return `${url.hostname}:${port}`;
}

function hostPortFromUrlLike(input: string): string | null {
  const direct = hostPortFromUrl(input);
  if (direct) return direct;
  if (input.includes('://')) return null;
  return hostPortFromUrl(`http://${input}`);
}

/**
 * Splits `host:port` on the rightmost colon. Bracketed IPv6 literals keep
 * their brackets, and `[::1]: 8080` (stray space after the colon) is accepted.
 */
export function splitHostPort(input: string): { host: string; port: string } | null {
  const value = input.trim();
  let host: string;
  let port: string;

  if (value.startsWith('[')) {
    const close = value.indexOf(']');
    if (close < 0) return null;
    const rest = value.slice(close + 1);
    if (!rest.startsWith(':')) return null;
    host = value.slice(0, close + 1);
    port = rest.slice(1).trim();
  } else {
    const separator = value.lastIndexOf(':');
    if (separator <= 0) return null;
    host = value.slice(0, separator).trim();
    port = value.slice(separator + 1).trim();
  }

  if (host.length === 0 || !/^\d+$/.test(port)) return null;
  if (Number(port) > 65535) return null;

  return { host, port };
}

function candidateToken(value: string): string {
  const stripped = value
    .replace(LEADING_NOISE, '')
    .replace(DIRECTIVE_PATTERN, '')
    .replace(LEADING_NOISE, '')
    .replace(SPACED_IPV6_PORT, '$1:');

  const [first = ''] = stripped.split(/\s+/);
  return first.replace(TRAILING_NOISE, '');
}

/**
 * Canonicalizes a proxy specification (URL, `host:port`, PAC token,
 * bracketed IPv6) into `host:port`. Scheme defaults fill a missing port,
 * so `proxy.local` becomes `proxy.local:80`.
 */
export function parseProxyTarget(raw: string): string | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0 || DIRECT_PATTERN.test(trimmed)) return null;

  const fromUrl = hostPortFromUrlLike(trimmed);
  if (fromUrl) return fromUrl;

  const token = candidateToken(trimmed);
  if (token.length === 0 || DIRECT_PATTERN.test(token)) return null;

  const fromToken = hostPortFromUrlLike(token);
  if (fromToken) return fromToken;

  const split = splitHostPort(token);
  return split ? `${split.host}:${split.port}` : null;
}

export function toHostPort(raw: string): string {
  const hostPort = parseProxyTarget(raw);
  if (!hostPort) {
    throw new ResolutionError({ reason: 'unparseable', input: raw });
  }
  return hostPort;
}

export function resolvedFromValue(value: string, source: ProxySource): ResolvedProxy {
  return Object.freeze({
    url: value,
    hostPort: toHostPort(value),
    source,
  });
}
