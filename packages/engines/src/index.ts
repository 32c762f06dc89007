// engines/src/index.ts
import fs from 'node:fs';
import {
  createDebugLogger,
  dedupeFindings,
  sortFindingsDeterministically,
  type EngineExecutionMeta,
  type EngineId,
  type Finding,
  type RawFinding,
  type ScanConfig,
} from '@mltriage/core';
import { scanSource, type RuleTable } from '@mltriage/rules';
import { CachedAdvisorySource, OsvAdvisorySource, queryKey, type AdvisoryQuery, type AdvisorySource } from './advisories.js';
import type { DiscoveredFile } from './discover.js';
import { extractNotebook, NotebookError } from './notebook.js';
import { internalErrorFinding, runPool, scanArtifacts, type ArtifactSource } from './pipeline.js';
import { parseRequirements } from './requirements.js';

export * from './advisories.js';
export * from './discover.js';
export * from './notebook.js';
export * from './pipeline.js';
export * from './requirements.js';

const dbg = createDebugLogger('engines');

export interface EngineContext {
  scanPath: string;
  config: ScanConfig;
  table: RuleTable;
  targets: readonly DiscoveredFile[];
  /** Defaults to a cached OSV client. */
  advisories?: AdvisorySource;
}

export interface EngineRunResult {
  findings: RawFinding[];
  artifacts: number;

  /**
   * Optional override that lets an adapter mark itself as SKIPPED without throwing.
   */
  meta?: {
    status?: EngineExecutionMeta['status'];
    errorMessage?: string;
  };
}

export interface EngineAdapter {
  engineId: EngineId;
  displayName: string;
  run(ctx: EngineContext): Promise<EngineRunResult>;
}

function toPosixPath(p: string): string {
  return String(p || '').replace(/\\/g, '/');
}

export function artifactPathFor(file: DiscoveredFile, ctx: EngineContext): string {
  return ctx.config.pathMode === 'absolute' ? toPosixPath(file.absPath) : file.filePath;
}

function targetsOf(ctx: EngineContext, kind: DiscoveredFile['kind']): DiscoveredFile[] {
  return ctx.targets.filter((t) => t.kind === kind);
}

function skipped(message: string): EngineRunResult {
  return { findings: [], artifacts: 0, meta: { status: 'skipped', errorMessage: message } };
}

async function readText(file: DiscoveredFile): Promise<string> {
  return fs.promises.readFile(file.absPath, 'utf8');
}

export class ModelsAdapter implements EngineAdapter {
  engineId = 'models' as const;
  displayName = 'Model artifact scanner';

  async run(ctx: EngineContext): Promise<EngineRunResult> {
    const models = targetsOf(ctx, 'model');
    if (!models.length) return skipped('No model artifacts found');

    const sources: ArtifactSource[] = models.map((file) => ({
      path: artifactPathFor(file, ctx),
      extensionClass: file.extensionClass ?? 'pickle',
      read: () => fs.promises.readFile(file.absPath),
    }));

    const outcomes = await scanArtifacts(sources, {
      table: ctx.table,
      engineId: this.engineId,
      limits: ctx.config.limits,
      strictProtocol: ctx.config.strictProtocol,
      timeout: ctx.config.timeout,
      concurrency: ctx.config.concurrency,
    });
    return { findings: outcomes.flatMap((o) => o.findings), artifacts: outcomes.length };
  }
}

export class SourceAdapter implements EngineAdapter {
  engineId = 'source' as const;
  displayName = 'Python source patterns';

  async run(ctx: EngineContext): Promise<EngineRunResult> {
    const files = targetsOf(ctx, 'source');
    if (!files.length) return skipped('No Python files found');

    const perFile = await runPool(files, ctx.config.concurrency, async (file) => {
      const artifactPath = artifactPathFor(file, ctx);
      try {
        return scanSource(await readText(file), artifactPath, ctx.table, { engineId: this.engineId });
      } catch (err) {
        return [internalErrorFinding(artifactPath, this.engineId, err)];
      }
    });
    return { findings: perFile.flat(), artifacts: files.length };
  }
}

export function notebookInvalidFinding(artifactPath: string, message: string): RawFinding {
  return {
    ruleId: 'NOTEBOOK_INVALID',
    title: 'Notebook could not be read',
    severity: 'warn',
    category: 'integrity',
    engineId: 'notebooks',
    artifactPath,
    locator: { kind: 'artifact' },
    rationale: 'The notebook is not valid nbformat JSON, so its cells were not scanned.',
    remediation: 'Open and re-save the notebook with Jupyter, then scan it again.',
    evidence: message,
    note: 'Notebook parse failure',
  };
}

export class NotebooksAdapter implements EngineAdapter {
  engineId = 'notebooks' as const;
  displayName = 'Notebook code cells';

  async run(ctx: EngineContext): Promise<EngineRunResult> {
    const files = targetsOf(ctx, 'notebook');
    if (!files.length) return skipped('No notebooks found');

    const perFile = await runPool(files, ctx.config.concurrency, async (file) => {
      const artifactPath = artifactPathFor(file, ctx);
      try {
        const nb = extractNotebook(await readText(file));
        return scanSource(nb.code, artifactPath, ctx.table, {
          engineId: this.engineId,
          locate: (line) => nb.lineMap[line - 1] ?? { line },
        });
      } catch (err) {
        if (err instanceof NotebookError) return [notebookInvalidFinding(artifactPath, err.message)];
        return [internalErrorFinding(artifactPath, this.engineId, err)];
      }
    });
    return { findings: perFile.flat(), artifacts: files.length };
  }
}

export class DependenciesAdapter implements EngineAdapter {
  engineId = 'deps' as const;
  displayName = 'Dependency advisories (OSV)';

  async run(ctx: EngineContext): Promise<EngineRunResult> {
    const files = targetsOf(ctx, 'requirements');
    if (!files.length) return skipped('No requirements files found');

    const parsed = await Promise.all(
      files.map(async (file) => ({ path: artifactPathFor(file, ctx), requirements: parseRequirements(await readText(file)) }))
    );

    const queries = new Map<string, AdvisoryQuery>();
    for (const { requirements } of parsed) {
      for (const r of requirements) if (r.version) queries.set(queryKey({ name: r.name, version: r.version }), { name: r.name, version: r.version });
    }

    const source =
      ctx.advisories ??
      new CachedAdvisorySource(
        new OsvAdvisorySource({
          ...(ctx.config.advisoryUrl ? { baseUrl: ctx.config.advisoryUrl } : {}),
          timeoutMs: ctx.config.timeout * 1000,
        })
      );
    const advisories = await source.lookup([...queries.values()]);

    const findings: RawFinding[] = [];
    for (const { path: artifactPath, requirements } of parsed) {
      for (const r of requirements) {
        const locator = { kind: 'line', line: r.line, column: 1 } as const;
        if (!r.version) {
          findings.push({
            ruleId: 'DEP_UNPINNED',
            title: 'Requirement is not pinned',
            severity: 'info',
            category: 'dependencies',
            engineId: this.engineId,
            artifactPath,
            locator,
            rationale: 'Without an exact version the installed release can change between runs, and it cannot be checked against advisories.',
            remediation: `Pin ${r.rawName} with == to a reviewed release.`,
            evidence: r.text,
            note: 'Unpinned requirement',
          });
          continue;
        }
        for (const adv of advisories.get(queryKey({ name: r.name, version: r.version })) ?? []) {
          findings.push({
            ruleId: adv.id,
            title: `${r.rawName} ${r.version} has a known vulnerability`,
            severity: adv.severity,
            category: 'dependencies',
            engineId: this.engineId,
            artifactPath,
            locator,
            rationale: adv.summary,
            remediation: adv.fixedIn.length
              ? `Upgrade ${r.rawName} to ${adv.fixedIn.join(' or ')} or later.`
              : `No fixed release is listed; consider replacing ${r.rawName}.`,
            evidence: r.text,
            note: adv.aliases.length ? `Also known as ${adv.aliases.join(', ')}` : 'OSV advisory',
          });
        }
      }
    }
    return { findings, artifacts: files.length };
  }
}

export function defaultAdapters(): EngineAdapter[] {
  return [new ModelsAdapter(), new SourceAdapter(), new NotebooksAdapter(), new DependenciesAdapter()];
}

export function listEngines(adapters: EngineAdapter[] = defaultAdapters()) {
  return adapters.map((a) => ({ engineId: a.engineId, displayName: a.displayName }));
}

export interface EnginesResult {
  findings: Finding[];
  meta: EngineExecutionMeta[];
  artifactsScanned: number;
}

/**
 * Runs the selected engines, at most `config.concurrency` at a time. A failing
 * engine is recorded in meta and contributes no findings; the others carry on.
 */
export async function runEngines(
  ctx: EngineContext,
  selectedEngines: readonly EngineId[],
  adapters: EngineAdapter[] = defaultAdapters()
): Promise<EnginesResult> {
  const selected = adapters.filter((adapter) => selectedEngines.includes(adapter.engineId));
  const raw: RawFinding[] = [];
  const meta: EngineExecutionMeta[] = [];
  let artifactsScanned = 0;

  await runPool(selected, ctx.config.concurrency, async (adapter) => {
    const start = Date.now();
    try {
      const result = await adapter.run(ctx);
      const status = result.meta?.status ?? 'ok';
      raw.push(...result.findings);
      artifactsScanned += result.artifacts;
      meta.push({
        engineId: adapter.engineId,
        displayName: adapter.displayName,
        status,
        durationMs: Date.now() - start,
        artifacts: result.artifacts,
        ...(result.meta?.errorMessage ? { errorMessage: result.meta.errorMessage } : {}),
      });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error ?? '');
      dbg('engine_failed', { engineId: adapter.engineId, message: msg });
      meta.push({
        engineId: adapter.engineId,
        displayName: adapter.displayName,
        status: 'failed',
        durationMs: Date.now() - start,
        artifacts: 0,
        errorMessage: msg,
      });
    }
  });

  return {
    findings: sortFindingsDeterministically(dedupeFindings(raw, ctx.config.redact)),
    meta: meta.sort((a, b) => selectedEngines.indexOf(a.engineId) - selectedEngines.indexOf(b.engineId)),
    artifactsScanned,
  };
}
