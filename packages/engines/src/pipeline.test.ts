import { describe, expect, test } from 'vitest';
import { loadRuleTable } from '@mltriage/rules';
import { buildNpy, buildZip, PickleWriter, systemCallPickle } from '@mltriage/pickle/testing';
import { runPool, scanArtifact, scanArtifacts } from './pipeline.js';

const table = loadRuleTable();

describe('artifact pipeline', () => {
  test('walks every state for a readable pickle', () => {
    const out = scanArtifact({ path: 'model.pkl', extensionClass: 'pickle', bytes: systemCallPickle('id') }, { table });
    expect(out.trace).toEqual(['Unopened', 'Demultiplexed', 'Parsed', 'Classified', 'Reported']);
    expect(out.streams).toBe(1);
    expect(out.findings.map((f) => [f.ruleId, f.engineId, f.evidence])).toEqual([['ML001', 'models', "os.system('id')"]]);
  });

  test('a container failure goes straight to Reported', () => {
    const bytes = buildNpy('<f8', new Uint8Array(8));
    const out = scanArtifact({ path: 'arr.npy', extensionClass: 'numpy', bytes }, { table });
    expect(out.trace).toEqual(['Unopened', 'Reported']);
    expect(out.findings).toHaveLength(1);
    expect(out.findings[0]).toMatchObject({
      ruleId: 'NO_PICKLE_STREAM',
      severity: 'info',
      locator: { kind: 'artifact' },
      errorKind: 'NoPickleStreamFound',
    });
  });

  test('classifies what was built before a stream error', () => {
    const bytes = new PickleWriter(2)
      .proto()
      .call('os', 'system', (w) => w.str('id'), 1)
      .toBytes();
    const out = scanArtifact({ path: 'cut.pkl', extensionClass: 'pickle', bytes }, { table });
    expect(out.findings.map((f) => f.ruleId)).toEqual(['ML001', 'PARSE_ERROR']);
    expect(out.findings[1]).toMatchObject({ errorKind: 'TruncatedStream', locator: { kind: 'byte', offset: 22 } });
  });

  test('reports a timeout once the deadline passes', () => {
    let calls = 0;
    const now = () => (calls++ === 0 ? 0 : 5_000);
    const out = scanArtifact(
      { path: 'slow.pkl', extensionClass: 'pickle', bytes: systemCallPickle('id') },
      { table, timeout: 1, now }
    );
    expect(out.findings).toHaveLength(1);
    expect(out.findings[0]).toMatchObject({
      ruleId: 'SCAN_TIMEOUT',
      errorKind: 'ScanTimeout',
      locator: { kind: 'byte', offset: 0 },
    });
    expect(out.trace.at(-1)).toBe('Reported');
  });

  test('a literal-only stream walks every state and reports nothing', () => {
    const bytes = new PickleWriter(2).proto().int(42).stop().toBytes();
    const out = scanArtifact({ path: 'answer.pkl', extensionClass: 'pickle', bytes }, { table });
    expect(out.trace).toEqual(['Unopened', 'Demultiplexed', 'Parsed', 'Classified', 'Reported']);
    expect(out.findings).toEqual([]);
  });

  test('scanning the same bytes twice gives identical findings', () => {
    const bytes = buildZip([
      { name: 'archive/data.pkl', data: systemCallPickle('rm -rf /') },
      { name: 'archive/extra.pkl', data: new PickleWriter(2).proto().call('os', 'system', (w) => w.str('id'), 1).toBytes() },
      { name: 'archive/data/0', data: new Uint8Array(16) },
    ]);
    const input = { path: 'model.pt', extensionClass: 'torch' as const, bytes };
    const first = scanArtifact(input, { table });
    const second = scanArtifact(input, { table });
    expect(first.findings.map((f) => f.ruleId)).toEqual(['ML001', 'ML001', 'PARSE_ERROR']);
    expect(second).toEqual(first);
  });

  test('an unreadable archive entry does not hide the streams beside it', () => {
    const bytes = buildZip([
      { name: 'archive/data.pkl', data: systemCallPickle('id') },
      { name: 'extra/random.npy', data: Uint8Array.from([7, 1, 2, 3, 4, 5, 6, 7, 8]) },
    ]);
    const out = scanArtifact({ path: 'model.pt', extensionClass: 'torch', bytes }, { table });
    expect(out.trace).toEqual(['Unopened', 'Demultiplexed', 'Parsed', 'Classified', 'Reported']);
    expect(out.findings.map((f) => [f.ruleId, f.severity, f.locator, f.evidence])).toEqual([
      ['ML001', 'critical', { kind: 'byte', offset: 2, entry: 'archive/data.pkl' }, "os.system('id')"],
      ['CONTAINER_CORRUPT', 'warn', { kind: 'byte', offset: 0, entry: 'extra/random.npy' }, 'extra/random.npy: bad .npy magic'],
    ]);
  });

  test('offsets inside .npy files count from the start of the file', () => {
    const pickle = systemCallPickle('id');
    const bytes = buildNpy('|O', pickle);
    const out = scanArtifact({ path: 'labels.npy', extensionClass: 'numpy', bytes }, { table });
    expect(out.findings.map((f) => [f.ruleId, f.locator])).toEqual([
      ['ML001', { kind: 'byte', offset: bytes.length - pickle.length + 2 }],
    ]);
  });

  test('read failures become internal errors without stopping the batch', async () => {
    const outcomes = await scanArtifacts(
      [
        { path: 'missing.pt', extensionClass: 'torch', read: async () => Promise.reject(new Error('ENOENT: missing.pt')) },
        { path: 'model.pkl', extensionClass: 'pickle', read: async () => systemCallPickle('id') },
      ],
      { table, concurrency: 2 }
    );

    expect(outcomes.map((o) => o.artifactPath)).toEqual(['missing.pt', 'model.pkl']);
    expect(outcomes[0]?.trace).toEqual(['Unopened', 'Reported']);
    expect(outcomes[0]?.findings[0]).toMatchObject({ ruleId: 'INTERNAL_ERROR', evidence: 'ENOENT: missing.pt' });
    expect(outcomes[1]?.findings.map((f) => f.ruleId)).toEqual(['ML001']);
  });
});

describe('runPool', () => {
  test('keeps input order and caps concurrency', async () => {
    let active = 0;
    let peak = 0;
    const out = await runPool([30, 10, 20, 5], 2, async (ms) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, ms));
      active--;
      return ms * 2;
    });
    expect(out).toEqual([60, 20, 40, 10]);
    expect(peak).toBe(2);
  });
});
