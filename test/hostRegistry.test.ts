import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { afterEach, describe, expect, it } from 'vitest';

import { formatProxySwitchError, HostsParseError } from '../src/errors';
import { loadHostRegistry, parseHostsText } from '../src/hosts/hostRegistry';

const tempPaths: string[] = [];

afterEach(async () => {
  while (tempPaths.length > 0) {
    const path = tempPaths.pop();
    if (!path) continue;
    await rm(path, { recursive: true, force: true });
  }
});

describe('parseHostsText', () => {
  it('parses patterns with optional proxy overrides', () => {
    const text = [
      '# proxied hosts',
      '',
      'github.com',
      'gitlab.example.com proxy=proxy2.test:3128 # internal',
      '*.corp   http://corp.test:8080',
      '',
    ].join('\n');

    expect(parseHostsText(text, 'hosts')).toEqual([
      { pattern: 'github.com', line: 3 },
      { pattern: 'gitlab.example.com', proxyOverride: 'proxy2.test:3128', line: 4 },
      { pattern: '*.corp', proxyOverride: 'http://corp.test:8080', line: 5 },
    ]);
  });

  it('accepts CRLF line endings', () => {
    expect(parseHostsText('a.test\r\nb.test\r\n', 'hosts')).toEqual([
      { pattern: 'a.test', line: 1 },
      { pattern: 'b.test', line: 2 },
    ]);
  });

  it('rejects an empty proxy value', () => {
    expect(() => parseHostsText('\nhost.test proxy=', 'hosts')).toThrowError(
      "hosts:2: empty proxy value for 'host.test'",
    );
  });

  it('rejects more than one proxy value', () => {
    expect(() => parseHostsText('host.test a.test:1 b.test:2', 'hosts')).toThrowError(
      "hosts:1: multiple proxy values for 'host.test' (a.test:1, b.test:2)",
    );
  });
});

describe('loadHostRegistry', () => {
  it('treats a missing file as an empty registry', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'proxyswitch-hosts-'));
    tempPaths.push(dir);

    await expect(loadHostRegistry(join(dir, 'hosts'))).resolves.toEqual([]);
  });

  it('reports the file path in parse errors', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'proxyswitch-hosts-'));
    tempPaths.push(dir);
    const path = join(dir, 'hosts');
    await writeFile(path, 'ok.test\nbad.test proxy=\n', 'utf8');

    await expect(loadHostRegistry(path)).rejects.toBeInstanceOf(HostsParseError);
    await expect(loadHostRegistry(path)).rejects.toMatchObject({ path, line: 2 });
  });
});

describe('formatProxySwitchError', () => {
  it('prefixes the error code', () => {
    expect(formatProxySwitchError(new HostsParseError('hosts', 3, 'missing host pattern'))).toBe(
      'HOSTS_PARSE_ERROR: hosts:3: missing host pattern',
    );
  });
});
