import { HostConflictError } from '../errors';
import type { HostEntry } from '../hosts/hostRegistry';

export interface SyncResult {
  text: string;
  changed: boolean;
}

export interface ApplyOptions {
  /** Append a `Host` block for registry patterns that no block declares. */
  appendMissing?: boolean;
}

export interface HostBlock {
  /** Index of the `Host` line. */
  start: number;
  /** Exclusive end index. */
  end: number;
  patterns: string[];
}

interface LineDocument {
  lines: string[];
  trailingNewline: boolean;
  /** Line ending of the first line; reused for every line on output. */
  eol: '\n' | '\r\n';
}

const DEFAULT_INDENT = '    ';
const HOST_LINE = /^host\s+\S/i;
const PROXY_COMMAND_LINE = /^proxycommand(?:\s+|\s*=\s*)(.*)$/i;

// Argument lists this tool has written. The second entry is the older
// `nc -x` form, still recognized so that removal can clean it up.
const TOOL_SIGNATURES: readonly RegExp[] = [
  /^\/usr\/bin\/nc\s+-X\s+connect\s+-x\s+\S+\s+%h\s+%p$/,
  /^nc\s+-x\s+\S+\s+%h\s+%p$/,
];

export function proxyCommandFor(proxy: string): string {
  return `ProxyCommand /usr/bin/nc -X connect -x ${proxy} %h %p`;
}

function splitDocument(text: string): LineDocument {
  const firstBreak = text.indexOf('\n');
  const eol = firstBreak > 0 && text[firstBreak - 1] === '\r' ? '\r\n' : '\n';
  if (text.length === 0) return { lines: [], trailingNewline: false, eol };

  const trailingNewline = text.endsWith('\n');
  const body = trailingNewline ? text.replace(/\r?\n$/, '') : text;
  return { lines: body.split(/\r?\n/), trailingNewline, eol };
}

function joinDocument(lines: string[], trailingNewline: boolean, eol: string): string {
  if (lines.length === 0) return '';
  const body = lines.join(eol);
  return trailingNewline ? `${body}${eol}` : body;
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

function isHostLine(line: string): boolean {
  return HOST_LINE.test(line.trim());
}

function isProxyCommand(line: string): boolean {
  return PROXY_COMMAND_LINE.test(line.trim());
}

export function isToolProxyCommand(line: string): boolean {
  const match = PROXY_COMMAND_LINE.exec(line.trim());
  if (!match) return false;
  const args = (match[1] ?? '').trim();
  return TOOL_SIGNATURES.some((signature) => signature.test(args));
}

function hostPatterns(line: string): string[] {
  return line
    .trim()
    .replace(/^host\s+/i, '')
    .split(/\s+/)
    .map((pattern) => pattern.replace(/^"(.*)"$/, '$1'))
    .filter((pattern) => pattern.length > 0);
}

export function findHostBlocks(lines: readonly string[]): HostBlock[] {
  const starts: number[] = [];
  lines.forEach((line, index) => {
    if (isHostLine(line)) starts.push(index);
  });

  return starts.map((start, position) => ({
    start,
    end: starts[position + 1] ?? lines.length,
    patterns: hostPatterns(lines[start] ?? ''),
  }));
}

function leadingWhitespace(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? '';
}

/** Most common indentation among directive lines; ties go to the first seen. */
export function prevailingIndent(body: readonly string[]): string {
  const counts = new Map<string, number>();
  for (const line of body) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) continue;
    const indent = leadingWhitespace(line);
    counts.set(indent, (counts.get(indent) ?? 0) + 1);
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [indent, count] of counts) {
    if (count > bestCount) {
      best = indent;
      bestCount = count;
    }
  }
  return best ?? DEFAULT_INDENT;
}

function matchingEntries(patterns: readonly string[], entries: readonly HostEntry[]): HostEntry[] {
  const declared = new Set(patterns.map((pattern) => pattern.toLowerCase()));
  return entries.filter((entry) => declared.has(entry.pattern.toLowerCase()));
}

function uniqueProxies(entries: readonly HostEntry[], defaultProxy: string): string[] {
  return [...new Set(entries.map((entry) => entry.proxyOverride ?? defaultProxy))];
}

function blockProxy(
  hostLine: string,
  lineNumber: number,
  patterns: string[],
  matches: readonly HostEntry[],
  defaultProxy: string,
): string {
  const proxies = uniqueProxies(matches, defaultProxy);
  const [proxy] = proxies;
  if (proxy === undefined || proxies.length > 1) {
    throw new HostConflictError({ hostLine, lineNumber, patterns, proxies });
  }
  return proxy;
}

function syncBlock(block: readonly string[], directive: string): { lines: string[]; changed: boolean } {
  const [hostLine, ...body] = block;
  if (hostLine === undefined) return { lines: [], changed: false };

  const expected = `${prevailingIndent(body)}${directive}`;
  const firstExisting = body.findIndex(isProxyCommand);

  if (firstExisting < 0) {
    return { lines: [hostLine, expected, ...body], changed: true };
  }

  let changed = false;
  const lines = [hostLine];
  body.forEach((line, index) => {
    if (index === firstExisting) {
      if (line !== expected) changed = true;
      lines.push(expected);
      return;
    }
    if (index > firstExisting && isToolProxyCommand(line)) {
      changed = true;
      return;
    }
    lines.push(line);
  });

  return { lines, changed };
}

function appendedBlocks(
  entries: readonly HostEntry[],
  declared: ReadonlySet<string>,
  defaultProxy: string,
): string[][] {
  const groups = new Map<string, HostEntry[]>();
  for (const entry of entries) {
    const key = entry.pattern.toLowerCase();
    if (declared.has(key)) continue;
    groups.set(key, [...(groups.get(key) ?? []), entry]);
  }

  const blocks: string[][] = [];
  for (const group of groups.values()) {
    const [first] = group;
    if (!first) continue;
    const hostLine = `Host ${first.pattern}`;
    const proxy = blockProxy(hostLine, first.line, [first.pattern], group, defaultProxy);
    blocks.push([hostLine, `${DEFAULT_INDENT}${proxyCommandFor(proxy)}`]);
  }
  return blocks;
}

/**
 * Ensures every host block that declares a registry pattern carries exactly
 * the expected `ProxyCommand` line. Everything else is passed through
 * untouched. Throws `HostConflictError` before producing any output when one
 * block maps to more than one proxy.
 */
export function applyProxyCommands(
  text: string,
  entries: readonly HostEntry[],
  defaultProxy: string,
  options: ApplyOptions = {},
): SyncResult {
  const document = splitDocument(text);
  const blocks = findHostBlocks(document.lines);
  const output = document.lines.slice(0, blocks[0]?.start ?? document.lines.length);
  const declared = new Set<string>();
  let changed = false;

  for (const block of blocks) {
    const blockLines = document.lines.slice(block.start, block.end);
    const matches = matchingEntries(block.patterns, entries);

    if (matches.length === 0) {
      output.push(...blockLines);
      continue;
    }

    for (const pattern of block.patterns) declared.add(pattern.toLowerCase());

    const proxy = blockProxy(
      blockLines[0] ?? '',
      block.start + 1,
      block.patterns,
      matches,
      defaultProxy,
    );
    const synced = syncBlock(blockLines, proxyCommandFor(proxy));
    changed = changed || synced.changed;
    output.push(...synced.lines);
  }

  if (options.appendMissing) {
    for (const appended of appendedBlocks(entries, declared, defaultProxy)) {
      const last = output[output.length - 1];
      if (last !== undefined && !isBlank(last)) output.push('');
      output.push(...appended);
      changed = true;
    }
  }

  if (!changed) return { text, changed };
  return { text: joinDocument(output, output.length > 0, document.eol), changed };
}

/**
 * Deletes tool-authored `ProxyCommand` lines from blocks that declare a
 * registry pattern. Hand-written `ProxyCommand` lines are kept.
 */
export function removeProxyCommands(text: string, entries: readonly HostEntry[]): SyncResult {
  const document = splitDocument(text);
  const blocks = findHostBlocks(document.lines);
  const output = document.lines.slice(0, blocks[0]?.start ?? document.lines.length);
  let changed = false;

  for (const block of blocks) {
    const [hostLine, ...body] = document.lines.slice(block.start, block.end);
    if (hostLine === undefined) continue;

    if (matchingEntries(block.patterns, entries).length === 0) {
      output.push(hostLine, ...body);
      continue;
    }

    const kept = body.filter((line) => !isToolProxyCommand(line));
    if (kept.length !== body.length) {
      changed = true;
      const [first, second] = kept;
      // Drop a blank line stranded right after the Host line.
      if (first !== undefined && isBlank(first) && (second === undefined || isBlank(second))) {
        kept.shift();
      }
    }

    output.push(hostLine, ...kept);
  }

  if (!changed) return { text, changed };
  return { text: joinDocument(output, document.trailingNewline, document.eol), changed };
}
