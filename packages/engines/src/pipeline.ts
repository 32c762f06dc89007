// packages/engines/src/pipeline.ts
import {
  DEFAULT_LIMITS,
  createDebugLogger,
  isScanError,
  scanErrorToRawFinding,
  type ArtifactInput,
  type RawFinding,
  type ScanLimits,
} from '@mltriage/core';
import { analyzeStream, demultiplex, type Demultiplexed, type StreamAnalysis } from '@mltriage/pickle';
import { classifyGraph, type RuleTable } from '@mltriage/rules';

const dbg = createDebugLogger('pipeline');

export type PipelineState = 'Unopened' | 'Demultiplexed' | 'Parsed' | 'Classified' | 'Reported';

export interface ArtifactScanContext {
  table: RuleTable;
  engineId?: string;
  limits?: ScanLimits;
  strictProtocol?: boolean;
  /** Wall-clock seconds allowed for this artifact. */
  timeout?: number;
  now?: () => number;
}

export interface ArtifactOutcome {
  artifactPath: string;
  /** States visited, in order; always ends in `Reported`. */
  trace: PipelineState[];
  findings: RawFinding[];
  streams: number;
}

export function internalErrorFinding(artifactPath: string, engineId: string, err: unknown): RawFinding {
  return {
    ruleId: 'INTERNAL_ERROR',
    title: 'Artifact could not be scanned',
    severity: 'warn',
    category: 'scan',
    engineId,
    artifactPath,
    locator: { kind: 'artifact' },
    rationale: 'The scanner failed on this artifact, so it was not classified.',
    remediation: 'Treat the artifact as unverified and report the failure with the debug log (MLTRIAGE_DEBUG=1).',
    evidence: err instanceof Error ? err.message : String(err),
    note: 'Scanner failure',
  };
}

/**
 * One artifact end to end: Unopened -> Demultiplexed -> Parsed -> Classified
 * -> Reported. A container failure becomes one finding and the artifact skips
 * ahead to Reported. An unreadable archive entry or a failed stream becomes a
 * finding of its own while the other streams are still classified, as are
 * graphs built before a stream failure.
 */
export function scanArtifact(input: ArtifactInput, ctx: ArtifactScanContext): ArtifactOutcome {
  const engineId = ctx.engineId ?? 'models';
  const limits = ctx.limits ?? DEFAULT_LIMITS;
  const now = ctx.now ?? Date.now;
  const deadline = ctx.timeout !== undefined ? now() + ctx.timeout * 1000 : undefined;
  const trace: PipelineState[] = ['Unopened'];
  const findings: RawFinding[] = [];
  const report = (streams: number): ArtifactOutcome => {
    trace.push('Reported');
    dbg('artifact', { path: input.path, trace: trace.join('>'), findings: findings.length });
    return { artifactPath: input.path, trace, findings, streams };
  };

  try {
    let demuxed: Demultiplexed;
    try {
      demuxed = demultiplex(input.bytes, input.extensionClass, limits);
    } catch (err) {
      if (!isScanError(err)) throw err;
      findings.push(scanErrorToRawFinding(err, { artifactPath: input.path, engineId }));
      return report(0);
    }
    trace.push('Demultiplexed');

    const analyses: StreamAnalysis[] = [];
    for (const stream of demuxed.streams) {
      const out = analyzeStream(stream, {
        limits,
        now,
        ...(ctx.strictProtocol !== undefined ? { strictProtocol: ctx.strictProtocol } : {}),
        ...(deadline !== undefined ? { deadline } : {}),
      });
      analyses.push(...out);
      if (out.some((a) => a.error?.kind === 'ScanTimeout')) break;
    }
    trace.push('Parsed');

    for (const a of analyses) {
      const entry = a.entry ? { entry: a.entry } : {};
      findings.push(...classifyGraph(a.graph, ctx.table, { artifactPath: input.path, engineId, ...entry }));
      if (a.error) findings.push(scanErrorToRawFinding(a.error, { artifactPath: input.path, engineId, ...entry }));
    }
    for (const f of demuxed.failures) {
      const entry = f.entry ? { entry: f.entry } : {};
      findings.push(scanErrorToRawFinding(f.error, { artifactPath: input.path, engineId, ...entry }));
    }
    trace.push('Classified');
    return report(analyses.length);
  } catch (err) {
    dbg('internal_error', { path: input.path, message: err instanceof Error ? err.message : String(err) });
    findings.push(internalErrorFinding(input.path, engineId, err));
    return report(0);
  }
}

/**
 * Bounded worker pool: `concurrency` workers pull items off a shared queue
 * until it is empty. Results keep the input order.
 */
export async function runPool<T, R>(items: readonly T[], concurrency: number, worker: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const limit = Math.max(1, Math.min(concurrency, items.length));

  const workers = new Array(limit).fill(0).map(async () => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) break;
      results[index] = await worker(item);
    }
  });

  await Promise.all(workers);
  return results;
}

export interface ArtifactSource {
  path: string;
  extensionClass: ArtifactInput['extensionClass'];
  read(): Promise<Uint8Array>;
}

/**
 * Scans artifacts with `concurrency` in flight. A read failure is reported on
 * that artifact as an internal error.
 */
export async function scanArtifacts(
  sources: readonly ArtifactSource[],
  ctx: ArtifactScanContext & { concurrency?: number }
): Promise<ArtifactOutcome[]> {
  return runPool(sources, ctx.concurrency ?? 4, async (src): Promise<ArtifactOutcome> => {
    let bytes: Uint8Array;
    try {
      bytes = await src.read();
    } catch (err) {
      return {
        artifactPath: src.path,
        trace: ['Unopened', 'Reported'],
        findings: [internalErrorFinding(src.path, ctx.engineId ?? 'models', err)],
        streams: 0,
      };
    }
    return scanArtifact({ path: src.path, extensionClass: src.extensionClass, bytes }, ctx);
  });
}
