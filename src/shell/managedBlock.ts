export const MANAGED_START = '### MANAGED BY PROXYSWITCH START (DO NOT EDIT)';
export const MANAGED_END = '### MANAGED BY PROXYSWITCH END (DO NOT EDIT)';

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

function isSentinel(line: string, sentinel: string): boolean {
  return line.trimEnd() === sentinel;
}

function withoutLine(lines: readonly string[], index: number): string[] {
  return [...lines.slice(0, index), ...lines.slice(index + 1)];
}

function lastStartBefore(lines: readonly string[], end: number): number {
  for (let index = end - 1; index >= 0; index -= 1) {
    if (isSentinel(lines[index] ?? '', MANAGED_START)) return index;
  }
  return -1;
}

// Each end sentinel closes the nearest start before it. Unpaired sentinels
// are dropped as single lines; the lines around them stay.
function stripOnce(lines: string[]): string[] | null {
  const end = lines.findIndex((line) => isSentinel(line, MANAGED_END));
  if (end < 0) {
    const orphan = lines.findIndex((line) => isSentinel(line, MANAGED_START));
    return orphan < 0 ? null : withoutLine(lines, orphan);
  }

  const start = lastStartBefore(lines, end);
  if (start < 0) return withoutLine(lines, end);

  let from = start;
  while (from > 0 && isBlank(lines[from - 1] ?? '')) from -= 1;

  let to = end + 1;
  while (to < lines.length && isBlank(lines[to] ?? '')) to += 1;

  const before = lines.slice(0, from);
  const after = lines.slice(to);

  if (before.length === 0) return after;
  // Keep the newline that terminated the last line before the block.
  return after.length === 0 ? [...before, ''] : [...before, ...after];
}

/**
 * Removes every managed block together with the blank lines around it, and
 * any sentinel line that has no partner.
 */
export function stripManagedBlock(content: string): { content: string; changed: boolean } {
  let lines = content.split('\n');
  let changed = false;

  for (;;) {
    const next = stripOnce(lines);
    if (next === null) break;
    lines = next;
    changed = true;
  }

  return changed ? { content: lines.join('\n'), changed } : { content, changed };
}

/** Appends a managed block after `base`, separated from it by exactly one blank line. */
export function renderManagedBlock(base: string, exportLines: readonly string[]): string {
  const lines = base.split('\n');
  while (lines.length > 0 && isBlank(lines[lines.length - 1] ?? '')) lines.pop();

  const prefix = lines.length > 0 ? `${lines.join('\n')}\n\n` : '';
  return `${prefix}${[MANAGED_START, ...exportLines, MANAGED_END].join('\n')}\n`;
}
