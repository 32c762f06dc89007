import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, test } from 'vitest';
import { summarize, toFinding, type EngineExecutionMeta, type Finding, type RawFinding, type ScanResult } from '@mltriage/core';
import { toSarif, writeSarif } from './index.js';

function mkFinding(overrides: Partial<RawFinding> = {}, redact = false): Finding {
  return toFinding(
    {
      ruleId: 'ML001',
      title: 'Process execution primitive',
      severity: 'critical',
      category: 'exec',
      engineId: 'models',
      artifactPath: 'models/model.pt',
      locator: { kind: 'byte', offset: 2, entry: 'archive/data.pkl' },
      rationale: 'Loading runs a shell command.',
      remediation: 'Do not load this file.',
      evidence: "os.system('id')",
      note: 'Global reference and call',
      ...overrides,
    },
    redact
  );
}

function mkResult(findings: Finding[], engines: EngineExecutionMeta[] = [], redacted = false): ScanResult {
  return {
    findings,
    summary: summarize(findings, 'none', { engines }),
    meta: {
      scannedPath: '.',
      generatedAt: '2026-01-01T00:00:00.000Z',
      timeout: 30,
      concurrency: 1,
      redacted,
      ruleTableVersion: '2026.10.1',
      engines,
    },
  };
}

describe('toSarif', () => {
  test('maps severities, locators and rule metadata', () => {
    const sarif = toSarif(
      mkResult([
        mkFinding(),
        mkFinding({
          ruleId: 'SRC002',
          title: 'Shell escape in notebook',
          severity: 'warn',
          engineId: 'notebooks',
          artifactPath: 'nb.ipynb',
          locator: { kind: 'line', line: 1, column: 1, cell: 4 },
          evidence: '!pip install foo',
        }),
      ])
    );

    const run = sarif.runs[0];
    expect(run?.tool.driver.rules?.map((r) => [r.id, r.defaultConfiguration?.level])).toEqual([
      ['ML001', 'error'],
      ['SRC002', 'warning'],
    ]);
    expect(run?.results.map((r) => [r.ruleId, r.level])).toEqual([
      ['ML001', 'error'],
      ['SRC002', 'warning'],
    ]);
    expect(run?.results[0]?.locations).toEqual([
      {
        physicalLocation: { artifactLocation: { uri: 'models/model.pt' }, region: { byteOffset: 2 } },
        logicalLocations: [{ name: 'archive/data.pkl', kind: 'member' }],
      },
    ]);
    expect(run?.results[1]?.locations?.[0]?.physicalLocation.region).toEqual({ startLine: 1, startColumn: 1 });
    expect(run?.results[0]?.message.text).toBe(
      "Process execution primitive: os.system('id') (Global reference and call). Do not load this file."
    );
  });

  test('redacted scans leave evidence out of messages', () => {
    const sarif = toSarif(mkResult([mkFinding({}, true)], [], true));
    expect(sarif.runs[0]?.results[0]?.message.text).toBe('Process execution primitive: Redacted evidence');
  });

  test('failed engines become note results with a fallback location', () => {
    const sarif = toSarif(
      mkResult(
        [],
        [{ engineId: 'deps', displayName: 'Dependency advisories (OSV)', status: 'failed', durationMs: 1, artifacts: 0, errorMessage: 'HTTP 503' }]
      )
    );
    const [note] = sarif.runs[0]?.results ?? [];
    expect(note).toEqual({
      ruleId: 'mltriage.engine.failed',
      level: 'note',
      message: { text: 'Dependency advisories (OSV) (deps) failed: HTTP 503' },
      locations: [{ physicalLocation: { artifactLocation: { uri: '.' }, region: { startLine: 1, startColumn: 1 } } }],
    });
  });

  test('artifact-level findings have no region', () => {
    const sarif = toSarif(mkResult([mkFinding({ ruleId: 'CONTAINER_CORRUPT', severity: 'warn', locator: { kind: 'artifact' } })]));
    expect(sarif.runs[0]?.results[0]?.locations?.[0]).toEqual({
      physicalLocation: { artifactLocation: { uri: 'models/model.pt' } },
    });
  });
});

describe('writeSarif', () => {
  test('writes results.sarif into the output directory', () => {
    const outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mltriage-sarif-'));
    try {
      const { path: file, log } = writeSarif(outDir, mkResult([mkFinding()]));
      expect(file).toBe(path.join(outDir, 'results.sarif'));
      expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual(log);
    } finally {
      fs.rmSync(outDir, { recursive: true, force: true });
    }
  });
});
