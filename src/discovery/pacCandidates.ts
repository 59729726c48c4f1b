const PROXIES_ASSIGNMENT = /proxies\s*=\s*["']([^"']+)["']/;
const PAC_DIRECTIVE = /^(?:PROXY|HTTPS|HTTP|SOCKS4|SOCKS5|SOCKS)\s+(\S+)$/i;
// Upper-case directives only; the token must carry a numeric port.
const PAC_TOKEN = /\b(?:PROXY|HTTPS|HTTP|SOCKS4|SOCKS5|SOCKS)\s+([A-Za-z0-9._~%\-[\]:]+:\d+)/g;

function pushUnique(target: string[], value: string): void {
  const cleaned = value.trim().replace(/[;,]+$/, '');
  if (cleaned.length === 0 || /^DIRECT$/i.test(cleaned)) return;
  if (!target.includes(cleaned)) target.push(cleaned);
}

/**
 * Splits a PAC return value such as `PROXY a:3128; PROXY b:3128; DIRECT`.
 * Entries without a directive are taken as bare `host:port` values.
 */
export function splitPacList(value: string): string[] {
  const candidates: string[] = [];

  for (const entry of value.split(';')) {
    const trimmed = entry.trim();
    if (trimmed.length === 0) continue;

    const directive = PAC_DIRECTIVE.exec(trimmed);
    pushUnique(candidates, directive?.[1] ?? trimmed);
  }

  return candidates;
}

/**
 * Pulls candidate proxies out of a fetched WPAD/PAC document without
 * evaluating it. A `proxies = "..."` assignment wins; otherwise every
 * directive token in the document is collected in order.
 */
export function extractPacCandidates(document: string): string[] {
  const trimmed = document.trim();
  if (trimmed.length === 0) return [];

  const assignment = PROXIES_ASSIGNMENT.exec(trimmed);
  if (assignment?.[1]) return splitPacList(assignment[1]);

  if (!/[(){}]/.test(trimmed)) return splitPacList(trimmed);

  const candidates: string[] = [];
  for (const match of trimmed.matchAll(PAC_TOKEN)) {
    if (match[1]) pushUnique(candidates, match[1]);
  }
  return candidates;
}
