// packages/core/src/limits.ts

/**
 * Hard caps applied while reading one artifact. Every stated size inside an
 * artifact is checked against these before anything is sliced or decoded.
 */
export interface ScanLimits {
  /** Bytes one pickle stream may consume. */
  maxStreamBytes: number;
  /** Bytes read from disk for one artifact; larger files are skipped by discovery. */
  maxArtifactBytes: number;
  /** Bytes of a string argument decoded for evidence and symbol names. */
  maxStringPreview: number;
  maxMemoEntries: number;
  maxGraphNodes: number;
  maxArchiveEntries: number;
  maxStreamsPerArtifact: number;
  /** Nodes visited when walking a capability graph from its result. */
  maxTraversalNodes: number;
}

export const DEFAULT_LIMITS: Readonly<ScanLimits> = Object.freeze({
  maxStreamBytes: 256 * 1024 * 1024,
  maxArtifactBytes: 2 * 1024 * 1024 * 1024,
  maxStringPreview: 4096,
  maxMemoEntries: 1_000_000,
  maxGraphNodes: 200_000,
  maxArchiveEntries: 65_536,
  maxStreamsPerArtifact: 64,
  maxTraversalNodes: 500_000,
});

const LIMIT_KEYS: readonly (keyof ScanLimits)[] = [
  'maxStreamBytes',
  'maxArtifactBytes',
  'maxStringPreview',
  'maxMemoEntries',
  'maxGraphNodes',
  'maxArchiveEntries',
  'maxStreamsPerArtifact',
  'maxTraversalNodes',
];

export function resolveLimits(partial?: Partial<Record<keyof ScanLimits, unknown>>): ScanLimits {
  const out: ScanLimits = { ...DEFAULT_LIMITS };
  if (!partial) return out;
  for (const key of LIMIT_KEYS) {
    const raw = partial[key];
    const n = typeof raw === 'number' ? raw : Number.parseInt(String(raw ?? ''), 10);
    if (Number.isFinite(n) && n > 0) out[key] = Math.floor(n);
  }
  return out;
}
