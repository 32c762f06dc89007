import { describe, expect, test } from 'vitest';
import {
  CachedAdvisorySource,
  OsvAdvisorySource,
  toAdvisory,
  type Advisory,
  type AdvisoryQuery,
  type AdvisorySource,
} from './advisories.js';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function fakeOsv(batch: unknown, records: Record<string, unknown> = {}) {
  const calls: { url: string; method: string; body?: string }[] = [];
  const impl: typeof fetch = async (input, init) => {
    const url = String(input);
    calls.push({ url, method: init?.method ?? 'GET', ...(typeof init?.body === 'string' ? { body: init.body } : {}) });
    if (url.endsWith('/v1/querybatch')) return json(batch);
    const id = decodeURIComponent(url.slice(url.lastIndexOf('/') + 1));
    const record = records[id];
    return record ? json(record) : json({ message: 'not found' }, 404);
  };
  return { impl, calls };
}

const RECORD = {
  id: 'GHSA-test-0001',
  summary: 'Code execution while loading checkpoints',
  aliases: ['CVE-2000-0001'],
  database_specific: { severity: 'HIGH' },
  affected: [{ ranges: [{ type: 'ECOSYSTEM', events: [{ introduced: '0' }, { fixed: '1.2.0' }] }] }],
};

describe('OSV advisory source', () => {
  test('batches queries, then fetches each distinct record once', async () => {
    const osv = fakeOsv(
      { results: [{ vulns: [{ id: 'GHSA-test-0001', modified: '2024-01-01T00:00:00Z' }] }, {}, { vulns: [{ id: 'GHSA-test-0001' }] }] },
      { 'GHSA-test-0001': RECORD }
    );
    const source = new OsvAdvisorySource({ baseUrl: 'http://osv.test/', fetch: osv.impl });

    const out = await source.lookup([
      { name: 'torch', version: '1.0.0' },
      { name: 'numpy', version: '1.26.0' },
      { name: 'torch', version: '1.1.0' },
    ]);

    const expected: Advisory = {
      id: 'GHSA-test-0001',
      summary: 'Code execution while loading checkpoints',
      severity: 'critical',
      aliases: ['CVE-2000-0001'],
      fixedIn: ['1.2.0'],
    };
    expect(out.get('torch@1.0.0')).toEqual([expected]);
    expect(out.get('numpy@1.26.0')).toEqual([]);
    expect(out.get('torch@1.1.0')).toEqual([expected]);

    expect(osv.calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      'POST http://osv.test/v1/querybatch',
      'GET http://osv.test/v1/vulns/GHSA-test-0001',
    ]);
    expect(JSON.parse(osv.calls[0]?.body ?? '{}').queries[1]).toEqual({
      package: { name: 'numpy', ecosystem: 'PyPI' },
      version: '1.26.0',
    });
  });

  test('makes no request without queries', async () => {
    const osv = fakeOsv({ results: [] });
    const out = await new OsvAdvisorySource({ fetch: osv.impl }).lookup([]);
    expect(out.size).toBe(0);
    expect(osv.calls).toEqual([]);
  });

  test('rejects HTTP errors and mismatched batch sizes', async () => {
    const failing: typeof fetch = async () => json({}, 500);
    await expect(
      new OsvAdvisorySource({ baseUrl: 'http://osv.test', fetch: failing }).lookup([{ name: 'a', version: '1' }])
    ).rejects.toThrow('OSV request failed: HTTP 500 for http://osv.test/v1/querybatch');

    const short = fakeOsv({ results: [] });
    await expect(new OsvAdvisorySource({ fetch: short.impl }).lookup([{ name: 'a', version: '1' }])).rejects.toThrow(
      'OSV querybatch returned 0 results for 1 queries'
    );
  });

  test('maps records without summary or known severity', () => {
    expect(toAdvisory({ id: 'PYSEC-0000-1', details: 'First line\nSecond line', database_specific: { severity: 'MODERATE' } })).toEqual({
      id: 'PYSEC-0000-1',
      summary: 'First line',
      severity: 'warn',
      aliases: [],
      fixedIn: [],
    });
  });
});

describe('CachedAdvisorySource', () => {
  test('asks the inner source only for unseen pins', async () => {
    const seen: string[][] = [];
    const inner: AdvisorySource = {
      async lookup(queries: readonly AdvisoryQuery[]) {
        seen.push(queries.map((q) => `${q.name}@${q.version}`));
        return new Map(queries.map((q) => [`${q.name}@${q.version}`, []]));
      },
    };
    const cached = new CachedAdvisorySource(inner);

    await cached.lookup([{ name: 'torch', version: '1.0.0' }]);
    const out = await cached.lookup([
      { name: 'torch', version: '1.0.0' },
      { name: 'numpy', version: '1.26.0' },
    ]);

    expect(seen).toEqual([['torch@1.0.0'], ['numpy@1.26.0']]);
    expect([...out.keys()]).toEqual(['torch@1.0.0', 'numpy@1.26.0']);
  });
});
