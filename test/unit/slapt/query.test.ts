import { compareVersions, parseSearchOutput, queryPackage, resolveInstalled, searchPattern } from '../../../src/slapt/query.js';
import { openSession } from '../../../src/slapt/runner.js';
import { ReconcileErrorCode } from '../../../src/shared/errors.js';
import { FakeExecutor, SLAPT, slaptContext } from '../../fixtures/fake-executor.js';

const SEARCH = [
  'iptables-1.8.4-x86_64-1 [inst=yes]: iptables (firewall administration tool)',
  'iptables-1.8.10-x86_64-1 [inst=no]: iptables (firewall administration tool)',
  'iptables-devel-1.0-noarch-2 [inst=no]: iptables-devel (headers)',
  'not a search line',
].join('\n');

const flags = { gpgCheck: true, ignoreDeps: false, ignoreChecksum: false, ignoreExcludes: false };

describe('parseSearchOutput', () => {
  it('splits package ids into name, version, arch and build', () => {
    const entries = parseSearchOutput(SEARCH);
    expect(entries).toHaveLength(3);
    expect(entries[0]).toEqual({
      id: 'iptables-1.8.4-x86_64-1',
      name: 'iptables',
      version: '1.8.4',
      arch: 'x86_64',
      build: '1',
      installed: true,
      description: 'iptables (firewall administration tool)',
    });
    expect(entries[2]?.name).toBe('iptables-devel');
  });
});

describe('compareVersions', () => {
  it('orders numeric runs by value', () => {
    const [older, newer] = parseSearchOutput(SEARCH);
    if (!older || !newer) throw new Error('fixture');
    expect(compareVersions(newer, older)).toBeGreaterThan(0);
    expect(compareVersions(older, older)).toBe(0);
  });
});

describe('resolveInstalled', () => {
  const entries = parseSearchOutput(SEARCH);

  it('reports installed when any version of the exact name is installed', () => {
    const result = resolveInstalled('iptables', entries, false);
    expect(result.installed).toBe(true);
    expect(result.candidates.map((c) => c.id)).toEqual(['iptables-1.8.10-x86_64-1', 'iptables-1.8.4-x86_64-1']);
  });

  it('reports not installed for latest when only an older version is', () => {
    expect(resolveInstalled('iptables', entries, true).installed).toBe(false);
  });

  it('does not match longer names', () => {
    expect(resolveInstalled('iptables-dev', entries, false)).toEqual({ name: 'iptables-dev', installed: false, candidates: [] });
  });
});

describe('searchPattern', () => {
  it('anchors plain names at the start of the package id', () => {
    expect(searchPattern('vim')).toBe('^vim-');
  });

  it('escapes regex metacharacters in the name', () => {
    expect(searchPattern('gtk+2')).toBe('^gtk\\+2-');
    expect(searchPattern('libsigc++')).toBe('^libsigc\\+\\+-');
    expect(searchPattern('a.b[c]')).toBe('^a\\.b\\[c\\]-');
  });

  it('matches the literal name and nothing else', () => {
    const pattern = new RegExp(searchPattern('gtk+2'));
    expect(pattern.test('gtk+2-2.24.33-x86_64-4 [inst=yes]: gtk+2 (multi-platform GUI toolkit)')).toBe(true);
    expect(pattern.test('gtkk2-1.0-x86_64-1 [inst=no]: gtkk2 (lookalike)')).toBe(false);
    expect(pattern.test('xgtk+2-1.0-x86_64-1 [inst=no]: xgtk+2')).toBe(false);
  });
});

describe('queryPackage', () => {
  it('searches through slapt-get', async () => {
    const fake = new FakeExecutor().on('--search', { stdout: SEARCH });

    const result = await queryPackage(openSession(slaptContext(fake), flags), 'iptables');

    expect(fake.lines).toEqual([`${SLAPT} --search ^iptables-`]);
    expect(result.installed).toBe(true);
  });

  it('finds installed packages whose names contain a plus sign', async () => {
    const fake = new FakeExecutor().on('--search', {
      stdout: 'gtk+2-2.24.33-x86_64-4 [inst=yes]: gtk+2 (multi-platform GUI toolkit)\n',
    });

    const result = await queryPackage(openSession(slaptContext(fake), flags), 'gtk+2');

    expect(fake.calls[0]?.argv.at(-1)).toBe('^gtk\\+2-');
    expect(result.installed).toBe(true);
    expect(result.candidates.map((c) => c.id)).toEqual(['gtk+2-2.24.33-x86_64-4']);
  });

  it('fails with QUERY_FAILED on a nonzero exit', async () => {
    const fake = new FakeExecutor().on('--search', { exitCode: 1, stderr: 'boom' });

    await expect(queryPackage(openSession(slaptContext(fake), flags), 'vim'))
      .rejects.toMatchObject({ code: ReconcileErrorCode.QUERY_FAILED, context: { package: 'vim', exitCode: 1 } });
  });
});
