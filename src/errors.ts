export type ProxySwitchErrorCode =
  | 'HOSTS_PARSE_ERROR'
  | 'SSH_HOST_CONFLICT'
  | 'PROXY_UNPARSEABLE'
  | 'PROXY_UNRESOLVED'
  | 'DISCOVERY_UNAVAILABLE'
  | 'DISCOVERY_NO_CANDIDATES'
  | 'CONFIG_INVALID'
  | 'IO_ERROR';

export class ProxySwitchError extends Error {
  public readonly code: ProxySwitchErrorCode;
  public readonly details?: Record<string, unknown>;

  public constructor(params: {
    code: ProxySwitchErrorCode;
    message: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = new.target.name;
    this.code = params.code;
    if (params.details !== undefined) {
      this.details = params.details;
    }
  }
}

export class HostsParseError extends ProxySwitchError {
  public constructor(
    public readonly path: string,
    public readonly line: number,
    reason: string,
  ) {
    super({
      code: 'HOSTS_PARSE_ERROR',
      message: `${path}:${line}: ${reason}`,
      details: { path, line },
    });
  }
}

export class HostConflictError extends ProxySwitchError {
  public constructor(params: {
    hostLine: string;
    lineNumber: number;
    patterns: string[];
    proxies: string[];
  }) {
    super({
      code: 'SSH_HOST_CONFLICT',
      message:
        `"${params.hostLine.trim()}" (line ${params.lineNumber}) maps to different proxies ` +
        `(${params.proxies.join(', ')}); split the host block or align proxy= overrides`,
      details: { ...params },
    });
  }
}

export type ResolutionFailure = 'unparseable' | 'none';

export class ResolutionError extends ProxySwitchError {
  public readonly reason: ResolutionFailure;
  public readonly input?: string;

  public constructor(params: { reason: ResolutionFailure; input?: string; message?: string }) {
    super({
      code: params.reason === 'unparseable' ? 'PROXY_UNPARSEABLE' : 'PROXY_UNRESOLVED',
      message:
        params.message ??
        (params.reason === 'unparseable'
          ? `Unable to determine proxy host from '${params.input ?? ''}'`
          : 'No proxy could be determined. Pass --proxy, export https_proxy or set defaultProxy'),
      ...(params.input !== undefined ? { details: { input: params.input } } : {}),
    });
    this.reason = params.reason;
    if (params.input !== undefined) {
      this.input = params.input;
    }
  }
}

export type DiscoveryFailure = 'unavailable' | 'no-candidates';

export class DiscoveryError extends ProxySwitchError {
  public readonly reason: DiscoveryFailure;

  public constructor(params: {
    reason: DiscoveryFailure;
    message: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super({
      code: params.reason === 'unavailable' ? 'DISCOVERY_UNAVAILABLE' : 'DISCOVERY_NO_CANDIDATES',
      message: params.message,
      ...(params.details !== undefined ? { details: params.details } : {}),
      cause: params.cause,
    });
    this.reason = params.reason;
  }
}

export class IoError extends ProxySwitchError {
  public constructor(
    public readonly operation: string,
    public readonly path: string,
    cause: unknown,
  ) {
    super({
      code: 'IO_ERROR',
      message: `${operation} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      details: { operation, path },
      cause,
    });
  }
}

export class ConfigError extends ProxySwitchError {
  public constructor(path: string, issues: unknown) {
    super({
      code: 'CONFIG_INVALID',
      message: `Invalid configuration in ${path}`,
      details: { path, issues },
    });
  }
}

export function formatProxySwitchError(error: ProxySwitchError): string {
  return `${error.code}: ${error.message}`;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof ProxySwitchError) return formatProxySwitchError(error);
  if (error instanceof Error) return error.message;
  return String(error);
}
