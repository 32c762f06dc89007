import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, test } from 'vitest';
import { classifyFile, discoverTargets, type TargetKind } from './discover.js';

const dirs: string[] = [];

function tmpProject(files: Record<string, string | Uint8Array>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'mltriage-discover-'));
  dirs.push(root);
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, content);
  }
  return root;
}

afterEach(() => {
  for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

describe('classifyFile', () => {
  test('maps extensions to target kinds', () => {
    expect(classifyFile('Model.PT')).toEqual({ kind: 'model', extensionClass: 'torch' });
    expect(classifyFile('weights.safetensors')).toEqual({ kind: 'model', extensionClass: 'safetensors' });
    expect(classifyFile('arrays.npz')).toEqual({ kind: 'model', extensionClass: 'numpy' });
    expect(classifyFile('clf.joblib')).toEqual({ kind: 'model', extensionClass: 'pickle' });
    expect(classifyFile('train.py')).toEqual({ kind: 'source' });
    expect(classifyFile('eda.ipynb')).toEqual({ kind: 'notebook' });
    expect(classifyFile('requirements-dev.txt')).toEqual({ kind: 'requirements' });
    expect(classifyFile('reqs.txt')).toBeUndefined();
    expect(classifyFile('README.md')).toBeUndefined();
  });
});

describe('discoverTargets', () => {
  test('walks in sorted order, skipping ignored dirs, unknown files and oversized models', () => {
    const root = tmpProject({
      'src/train.py': 'print(1)\n',
      'model.pkl': 'abc',
      'notebooks/a.ipynb': '{}',
      'requirements-dev.txt': 'torch\n',
      'README.md': '# readme\n',
      '.venv/lib.py': 'x = 1\n',
      'node_modules/x.py': 'x = 1\n',
      'weights/big.bin': new Uint8Array(32),
    });

    const { files, stats } = discoverTargets(root, { maxArtifactBytes: 10 });

    expect(files.map((f) => [f.kind, f.filePath])).toEqual([
      ['model', 'model.pkl'],
      ['notebook', 'notebooks/a.ipynb'],
      ['requirements', 'requirements-dev.txt'],
      ['source', 'src/train.py'],
    ]);
    expect(files[0]).toMatchObject({ extensionClass: 'pickle', sizeBytes: 3 });
    expect(stats).toEqual({
      filesConsidered: 6,
      filesSelected: 4,
      filesSkipped: 4,
      skipReasons: { ignored: 2, read_error: 0, symlink: 0, too_large: 1, unsupported_ext: 1 },
    });
  });

  test('a single file target is reported by its basename', () => {
    const root = tmpProject({ 'model.pkl': 'abc' });
    const { files } = discoverTargets(path.join(root, 'model.pkl'), { maxArtifactBytes: 100 });
    expect(files.map((f) => f.filePath)).toEqual(['model.pkl']);
  });

  test('kinds restricts what is collected', () => {
    const root = tmpProject({ 'model.pkl': 'abc', 'train.py': 'x\n' });
    const { files, stats } = discoverTargets(root, { maxArtifactBytes: 100, kinds: new Set<TargetKind>(['source']) });
    expect(files.map((f) => f.filePath)).toEqual(['train.py']);
    expect(stats.skipReasons.unsupported_ext).toBe(1);
  });

  test('does not follow symlinks', () => {
    const root = tmpProject({ 'real/model.pkl': 'abc' });
    try {
      fs.symlinkSync(path.join(root, 'real'), path.join(root, 'linked'));
    } catch {
      return;
    }
    const { files, stats } = discoverTargets(root, { maxArtifactBytes: 100 });
    expect(files.map((f) => f.filePath)).toEqual(['real/model.pkl']);
    expect(stats.skipReasons.symlink).toBe(1);
  });
});
