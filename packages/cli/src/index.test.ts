// packages/cli/src/index.test.ts
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { DEFAULT_LIMITS } from '@mltriage/core';
import { systemCallPickle } from '@mltriage/pickle/testing';
import {
  getHelpText,
  main,
  normalizeOutDir,
  parseArgs,
  parseListOpt,
  resolveConfig,
  runScan,
} from './index.js';

const dirs: string[] = [];

function mkTmp(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mltriage-cli-'));
  dirs.push(dir);
  return dir;
}

function writeFiles(root: string, files: Record<string, string | Uint8Array>) {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, content);
  }
}

afterEach(() => {
  vi.restoreAllMocks();
  for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

describe('parseArgs', () => {
  test('parses scan options, inline values and boolean flags', () => {
    expect(parseArgs(['scan', './proj', '--out-dir', 'o', '--format=json,md', '--redact', '--models'])).toEqual({
      command: 'scan',
      scanPath: './proj',
      opts: { 'out-dir': 'o', format: 'json,md', redact: true, models: true },
    });
  });

  test('supports --list-engines and help', () => {
    expect(parseArgs(['--list-engines'])).toEqual({ command: 'list-engines', opts: { 'list-engines': true }, showHelp: false });
    expect(parseArgs(['scan', '--help'])).toMatchObject({ showHelp: true, helpTarget: 'scan' });
    expect(parseArgs(['-h'])).toMatchObject({ showHelp: true, helpTarget: 'general' });
    expect(getHelpText('scan')).toContain('--fail-on <critical|warn|none>');
  });

  test('rejects a missing path or value', () => {
    expect(() => parseArgs(['scan'])).toThrow('Usage: mltriage scan <path> [options]');
    expect(() => parseArgs(['scan', 'p', '--timeout'])).toThrow('Missing value for --timeout');
  });
});

describe('config resolution', () => {
  test('defaults without a config file', () => {
    const cwd = mkTmp();
    expect(resolveConfig({}, cwd)).toEqual({
      outDir: path.resolve(cwd, 'mltriage'),
      format: ['json', 'html', 'sarif', 'md'],
      timeout: 30,
      concurrency: 4,
      failOn: 'critical',
      redact: false,
      pathMode: 'relative',
      engines: ['models', 'source', 'notebooks', 'deps'],
      limits: { ...DEFAULT_LIMITS },
      strictProtocol: true,
    });
  });

  test('reads mltriage.yml and lets flags win', () => {
    const cwd = mkTmp();
    writeFiles(cwd, {
      'mltriage.yml': [
        'failOn: warn',
        'engines: [models, source]',
        'timeout: 5',
        'rules: rules/custom.yml',
        'limits:',
        '  maxStreamBytes: 1024',
        'strictProtocol: false',
        '',
      ].join('\n'),
    });

    const fromFile = resolveConfig({}, cwd);
    expect(fromFile).toMatchObject({
      failOn: 'warn',
      engines: ['models', 'source'],
      timeout: 5,
      rules: path.join(cwd, 'rules', 'custom.yml'),
      strictProtocol: false,
    });
    expect(fromFile.limits.maxStreamBytes).toBe(1024);
    expect(fromFile.limits.maxGraphNodes).toBe(DEFAULT_LIMITS.maxGraphNodes);

    const flagged = resolveConfig({ 'fail-on': 'none', source: true, 'strict-protocol': true }, cwd);
    expect(flagged).toMatchObject({ failOn: 'none', engines: ['source'], strictProtocol: true });
  });

  test('rejects invalid config values', () => {
    const cwd = mkTmp();
    writeFiles(cwd, { 'mltriage.yml': 'failOn: high\n' });
    expect(() => resolveConfig({}, cwd)).toThrow(/^Invalid config .*mltriage\.yml: failOn: /);

    const other = mkTmp();
    expect(() => resolveConfig({ engines: 'models,foo' }, other)).toThrow(
      'Unknown engine: foo (available: models, source, notebooks, deps)'
    );
    expect(() => resolveConfig({ concurrency: '0' }, other)).toThrow('Invalid --concurrency value: 0');
    expect(() => resolveConfig({ config: 'missing.yml' }, other)).toThrow(/^Config file not found: /);
  });

  test('--no-strict-protocol turns protocol checks off', () => {
    expect(resolveConfig({ 'no-strict-protocol': true }, mkTmp()).strictProtocol).toBe(false);
  });
});

describe('helpers', () => {
  test('normalizeOutDir resolves against cwd', () => {
    expect(normalizeOutDir(undefined, '/work')).toBe(path.resolve('/work', 'mltriage'));
    expect(normalizeOutDir('  out ', '/work')).toBe(path.resolve('/work', 'out'));
  });

  test('parseListOpt splits, lowercases and dedupes', () => {
    expect(parseListOpt('JSON, md json', ['html'])).toEqual(['json', 'md']);
    expect(parseListOpt(['sarif', 'md'], ['html'])).toEqual(['sarif', 'md']);
    expect(parseListOpt(undefined, ['html'])).toEqual(['html']);
  });
});

describe('scan', () => {
  test('runScan builds a result with summary and meta', async () => {
    const root = mkTmp();
    writeFiles(root, { 'models/model.pkl': systemCallPickle('id'), 'train.py': 'print("hi")\n' });
    const config = resolveConfig({ models: true, source: true }, root);

    const result = await runScan(root, config);

    expect(result.findings.map((f) => `${f.artifactPath}:${f.ruleId}`)).toEqual(['models/model.pkl:ML001']);
    expect(result.meta).toMatchObject({ scannedPath: '.', ruleTableVersion: '2026.10.1', redacted: false });
    expect(result.meta.engines.map((e) => `${e.engineId}=${e.status}`)).toEqual(['models=ok', 'source=ok']);
    expect(result.summary).toMatchObject({
      totalFindings: 1,
      artifactsScanned: 2,
      scanStatus: 'COMPLETED',
      gate: { status: 'FAIL', failOn: 'critical', reason: 'critical=1 (>0)' },
    });
  });

  test('main writes every output and exits 2 when the gate fails', async () => {
    const root = mkTmp();
    const out = path.join(root, 'out');
    writeFiles(root, { 'proj/model.pkl': systemCallPickle('id') });
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const code = await main(['scan', 'proj', '--out-dir', out, '--models'], { cwd: root });

    expect(code).toBe(2);
    for (const name of ['report.json', 'summary.md', 'report.html', 'results.sarif']) {
      expect(fs.existsSync(path.join(out, name))).toBe(true);
    }
    const report = JSON.parse(fs.readFileSync(path.join(out, 'report.json'), 'utf8'));
    expect(report.findings[0].ruleId).toBe('ML001');
    expect(report.findings[0].artifactPath).toBe('model.pkl');
    expect(log).toHaveBeenCalledWith(`mltriage: wrote outputs to ${out}`);
    expect(log).toHaveBeenCalledWith('Engines: models=ok');
    expect(log).toHaveBeenCalledWith('mltriage FAIL grade C findings=1 (critical=1 warn=0 info=0)');
  });

  test('main exits 0 with the gate disabled and honours --format', async () => {
    const root = mkTmp();
    const out = path.join(root, 'out');
    writeFiles(root, { 'proj/model.pkl': systemCallPickle('id') });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const code = await main(['scan', 'proj', '--out-dir', out, '--models', '--fail-on', 'none', '--format', 'json'], { cwd: root });

    expect(code).toBe(0);
    expect(fs.readdirSync(out)).toEqual(['report.json']);
  });

  test('fatal errors exit 1', async () => {
    const root = mkTmp();
    writeFiles(root, { 'proj/train.py': 'x = 1\n' });
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await main(['scan', 'missing'], { cwd: root })).toBe(1);
    expect(err).toHaveBeenLastCalledWith(`Scan path does not exist: ${path.join(root, 'missing')}`);

    expect(await main(['scan', 'proj', '--rules', 'nope.yml', '--source'], { cwd: root })).toBe(1);
    expect(String(err.mock.lastCall?.[0])).toMatch(/^invalid rule table .*nope\.yml: cannot read file: /);
  });

  test('--list-engines prints one line per engine', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    expect(await main(['--list-engines'])).toBe(0);
    expect(log.mock.calls.map((c) => c[0])).toEqual([
      'models\tModel artifact scanner',
      'source\tPython source patterns',
      'notebooks\tNotebook code cells',
      'deps\tDependency advisories (OSV)',
    ]);
  });
});
