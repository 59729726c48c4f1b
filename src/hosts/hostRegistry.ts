import { HostsParseError } from '../errors';
import { readTextIfExists } from '../util/textFile';

export interface HostEntry {
  pattern: string;
  proxyOverride?: string;
  /** 1-based line in the hosts file. */
  line: number;
}

const OVERRIDE_PREFIX = 'proxy=';

function parseLine(raw: string, lineNumber: number, path: string): HostEntry | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) return null;

  const tokens: string[] = [];
  for (const token of trimmed.split(/\s+/)) {
    if (token.startsWith('#')) break;
    tokens.push(token);
  }

  const [pattern, ...rest] = tokens;
  if (pattern === undefined) {
    throw new HostsParseError(path, lineNumber, 'missing host pattern');
  }

  let proxyOverride: string | undefined;
  for (const token of rest) {
    const value = token.startsWith(OVERRIDE_PREFIX) ? token.slice(OVERRIDE_PREFIX.length) : token;

    if (value.length === 0) {
      throw new HostsParseError(path, lineNumber, `empty proxy value for '${pattern}'`);
    }
    if (proxyOverride !== undefined) {
      throw new HostsParseError(
        path,
        lineNumber,
        `multiple proxy values for '${pattern}' (${proxyOverride}, ${value})`,
      );
    }
    proxyOverride = value;
  }

  return proxyOverride === undefined
    ? { pattern, line: lineNumber }
    : { pattern, proxyOverride, line: lineNumber };
}

export function parseHostsText(text: string, path: string): HostEntry[] {
  const entries: HostEntry[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    const entry = parseLine(line, index + 1, path);
    if (entry) entries.push(entry);
  });

  return entries;
}

/** Loads the hosts registry; a missing file is an empty registry. */
export async function loadHostRegistry(path: string): Promise<HostEntry[]> {
  const text = await readTextIfExists(path);
  if (text === null) return [];
  return parseHostsText(text, path);
}
