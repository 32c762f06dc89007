// packages/engines/src/discover.ts
import fs from 'node:fs';
import path from 'node:path';
import { createDebugLogger, type ExtensionClass } from '@mltriage/core';

const dbg = createDebugLogger('discover');

export type TargetKind = 'model' | 'source' | 'notebook' | 'requirements';

export interface DiscoveredFile {
  kind: TargetKind;
  /** Scan-root relative POSIX path; the basename when the root is a file. */
  filePath: string;
  absPath: string;
  sizeBytes: number;
  /** Set for models. */
  extensionClass?: ExtensionClass;
}

export type DiscoverySkipReason = 'ignored' | 'symlink' | 'too_large' | 'unsupported_ext' | 'read_error';

export interface DiscoveryStats {
  filesConsidered: number;
  filesSelected: number;
  filesSkipped: number;
  skipReasons: Record<DiscoverySkipReason, number>;
}

export interface DiscoverOptions {
  maxArtifactBytes: number;
  maxTextBytes?: number;
  /** Kinds to collect; everything when unset. */
  kinds?: ReadonlySet<TargetKind>;
}

export const DEFAULT_MAX_TEXT_BYTES = 16 * 1024 * 1024;

const MODEL_EXTS: Record<string, ExtensionClass> = {
  '.pkl': 'pickle',
  '.pickle': 'pickle',
  '.joblib': 'pickle',
  '.dill': 'pickle',
  '.pt': 'torch',
  '.pth': 'torch',
  '.ckpt': 'torch',
  '.bin': 'torch',
  '.npy': 'numpy',
  '.npz': 'numpy',
  '.safetensors': 'safetensors',
};

/**
 * Directory ignore policy: VCS metadata, virtualenvs, caches and build output.
 */
const IGNORE_DIR_NAMES = new Set([
  'node_modules',
  '.git',
  '.hg',
  '.svn',
  'dist',
  'build',
  '.venv',
  'venv',
  'env',
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  '.ipynb_checkpoints',
  '.tox',
  '.cache',
  '.idea',
  'site-packages',
]);

/**
 * Deterministic comparator (avoid locale/ICU differences across OS)
 */
function asciiCompare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function toPosix(p: string): string {
  return String(p ?? '').replace(/\\/g, '/');
}

function safeRealpath(p: string): string {
  try {
    return fs.realpathSync.native(p);
  } catch {
    return p;
  }
}

function shouldSkipDir(dirPath: string, root: string): boolean {
  if (dirPath === root) return false;
  const base = path.basename(dirPath).toLowerCase();
  if (IGNORE_DIR_NAMES.has(base)) return true;
  return base.startsWith('.') && base !== '.github';
}

export function classifyFile(fileName: string): { kind: TargetKind; extensionClass?: ExtensionClass } | undefined {
  const base = fileName.toLowerCase();
  const ext = path.extname(base);
  const extensionClass = MODEL_EXTS[ext];
  if (extensionClass) return { kind: 'model', extensionClass };
  if (ext === '.py') return { kind: 'source' };
  if (ext === '.ipynb') return { kind: 'notebook' };
  if (/^requirements[\w.-]*\.txt$/.test(base)) return { kind: 'requirements' };
  return undefined;
}

function initStats(): DiscoveryStats {
  return {
    filesConsidered: 0,
    filesSelected: 0,
    filesSkipped: 0,
    skipReasons: { ignored: 0, read_error: 0, symlink: 0, too_large: 0, unsupported_ext: 0 },
  };
}

/**
 * Walks `target` in sorted order and classifies every file by extension.
 * Symlinks are never followed; files above the size caps are counted and skipped.
 */
export function discoverTargets(target: string, options: DiscoverOptions): { files: DiscoveredFile[]; stats: DiscoveryStats } {
  const root = safeRealpath(path.resolve(target));
  const maxText = options.maxTextBytes ?? DEFAULT_MAX_TEXT_BYTES;
  const stats = initStats();
  const out: DiscoveredFile[] = [];

  const skip = (reason: DiscoverySkipReason, absPath: string) => {
    stats.filesSkipped += 1;
    stats.skipReasons[reason] += 1;
    dbg('skip', { reason, path: absPath });
  };

  const walk = (absPath: string) => {
    let lst: fs.Stats;
    try {
      lst = fs.lstatSync(absPath);
    } catch {
      skip('read_error', absPath);
      return;
    }

    if (lst.isSymbolicLink()) {
      skip('symlink', absPath);
      return;
    }

    if (lst.isDirectory()) {
      if (shouldSkipDir(absPath, root)) {
        skip('ignored', absPath);
        return;
      }
      let children: string[];
      try {
        children = fs.readdirSync(absPath);
      } catch {
        skip('read_error', absPath);
        return;
      }
      children.sort(asciiCompare);
      for (const child of children) walk(path.join(absPath, child));
      return;
    }

    if (!lst.isFile()) return;
    stats.filesConsidered += 1;

    const cls = classifyFile(path.basename(absPath));
    if (!cls || (options.kinds && !options.kinds.has(cls.kind))) {
      skip('unsupported_ext', absPath);
      return;
    }

    const cap = cls.kind === 'model' ? options.maxArtifactBytes : maxText;
    if (lst.size > cap) {
      skip('too_large', absPath);
      return;
    }

    const rel = absPath === root ? path.basename(absPath) : path.relative(root, absPath);
    out.push({
      kind: cls.kind,
      filePath: toPosix(rel),
      absPath,
      sizeBytes: lst.size,
      ...(cls.extensionClass ? { extensionClass: cls.extensionClass } : {}),
    });
    stats.filesSelected += 1;
  };

  walk(root);
  out.sort((a, b) => asciiCompare(a.filePath, b.filePath));
  return { files: out, stats };
}
