import fs from 'node:fs';
import path from 'node:path';
import type { EngineExecutionMeta, Finding, Locator, ScanResult, Severity } from '@mltriage/core';

type SarifLevel = 'error' | 'warning' | 'note';

type SarifRule = {
  id: string;
  name?: string;
  shortDescription?: { text: string };
  fullDescription?: { text: string };
  help?: { text: string };
  defaultConfiguration?: { level: SarifLevel };
};

interface SarifRegion {
  startLine?: number;
  startColumn?: number;
  byteOffset?: number;
}

interface SarifLocation {
  physicalLocation: {
    artifactLocation: { uri: string };
    region?: SarifRegion;
  };
  logicalLocations?: Array<{ name: string; kind: string }>;
}

interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: { text: string };
  locations?: SarifLocation[];
  fingerprints?: Record<string, string>;
  properties?: Record<string, unknown>;
}

interface SarifRun {
  tool: {
    driver: {
      name: string;
      informationUri?: string;
      version?: string;
      rules?: SarifRule[];
    };
  };
  results: SarifResult[];
}

export interface SarifLog {
  version: '2.1.0';
  $schema: string;
  runs: SarifRun[];
}

const SCHEMA = 'https://json.schemastore.org/sarif-2.1.0.json';

function toSarifLevel(severity: Severity): SarifLevel {
  return severity === 'critical' ? 'error' : severity === 'warn' ? 'warning' : 'note';
}

/**
 * Keep URIs stable across Windows/macOS/Linux: always '/' separators, never
 * path.normalize().
 */
function toSarifUri(filePath: string | undefined): string {
  if (!filePath || !filePath.trim()) return '.';
  return filePath.trim().replace(/\\/g, '/');
}

/** Stable, locale-independent compare helpers */
function cmpStr(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
function cmpNum(a: number, b: number): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

function levelRank(level: SarifLevel): number {
  // error (0) < warning (1) < note (2)
  if (level === 'error') return 0;
  if (level === 'warning') return 1;
  return 2;
}

function locationKey(loc: SarifLocation): string {
  const uri = toSarifUri(loc.physicalLocation.artifactLocation.uri);
  const r = loc.physicalLocation.region ?? {};
  const entry = loc.logicalLocations?.[0]?.name ?? '';
  // Separators that won't collide with file names
  return `${uri}\u0000${entry}\u0000${r.startLine ?? 0}\u0000${r.startColumn ?? 0}\u0000${r.byteOffset ?? -1}`;
}

const FALLBACK_LOCATION: SarifLocation = {
  physicalLocation: { artifactLocation: { uri: '.' }, region: { startLine: 1, startColumn: 1 } },
};

function regionFor(locator: Locator): SarifRegion | undefined {
  if (locator.kind === 'line') {
    return { startLine: Math.max(1, locator.line), startColumn: Math.max(1, locator.column) };
  }
  if (locator.kind === 'byte') return { byteOffset: Math.max(0, locator.offset) };
  return undefined;
}

function locationFor(finding: Finding): SarifLocation {
  const region = regionFor(finding.locator);
  const entry =
    finding.locator.kind === 'byte' && finding.locator.entry
      ? [{ name: finding.locator.entry, kind: 'member' }]
      : finding.locator.kind === 'line' && finding.locator.cell !== undefined
        ? [{ name: `cell ${finding.locator.cell}`, kind: 'member' }]
        : undefined;

  return {
    physicalLocation: {
      artifactLocation: { uri: toSarifUri(finding.artifactPath) },
      ...(region ? { region } : {}),
    },
    ...(entry ? { logicalLocations: entry } : {}),
  };
}

function findingToSarifResult(finding: Finding, redact: boolean): SarifResult {
  const message = redact
    ? `${finding.title}: ${finding.evidence.note}`
    : `${finding.title}: ${finding.evidence.excerpt ?? ''} (${finding.evidence.note}). ${finding.remediation}`;

  return {
    ruleId: finding.ruleId,
    level: toSarifLevel(finding.severity),
    message: { text: message },
    locations: [locationFor(finding)],
    fingerprints: { primaryLocationLineHash: finding.fingerprint },
    properties: {
      findingId: finding.findingId,
      severity: finding.severity,
      category: finding.category,
      engineId: finding.engineId,
      ...(finding.errorKind ? { errorKind: finding.errorKind } : {}),
    },
  };
}

const ENGINE_NOTE_RULE = 'mltriage.engine.failed';

/**
 * Failed engines surface as note results so a consumer of the SARIF alone
 * can tell the scan was partial.
 */
function engineStatusNotes(enginesMeta: readonly EngineExecutionMeta[]): { rules: SarifRule[]; results: SarifResult[] } {
  const failed = enginesMeta.filter((e) => e.status === 'failed');
  if (!failed.length) return { rules: [], results: [] };

  return {
    rules: [
      {
        id: ENGINE_NOTE_RULE,
        name: 'Engine failed to run',
        shortDescription: { text: 'An engine failed; its artifact class was not scanned.' },
        defaultConfiguration: { level: 'note' },
      },
    ],
    results: failed.map((e) => ({
      ruleId: ENGINE_NOTE_RULE,
      level: 'note',
      message: { text: `${e.displayName} (${e.engineId}) failed${e.errorMessage ? `: ${e.errorMessage}` : ''}` },
      locations: [FALLBACK_LOCATION],
    })),
  };
}

function primaryLocationKey(result: SarifResult): string {
  const loc = result.locations?.[0];
  return loc ? locationKey(loc) : locationKey(FALLBACK_LOCATION);
}

/**
 * Deterministic run normalization:
 * - stable rules ordering
 * - stable results ordering using explicit ranking, NOT localeCompare()
 */
function normalizeRun(run: SarifRun): SarifRun {
  const byId = new Map<string, SarifRule>();
  for (const r of run.tool.driver.rules ?? []) if (!byId.has(r.id)) byId.set(r.id, r);
  const rules = [...byId.values()].sort((a, b) => cmpStr(a.id, b.id));

  const results = run.results
    .map((r) => (r.locations?.length ? r : { ...r, locations: [FALLBACK_LOCATION] }))
    .sort((a, b) => {
      const rcmp = cmpNum(levelRank(a.level), levelRank(b.level));
      if (rcmp !== 0) return rcmp;

      const rid = cmpStr(a.ruleId, b.ruleId);
      if (rid !== 0) return rid;

      const pl = cmpStr(primaryLocationKey(a), primaryLocationKey(b));
      if (pl !== 0) return pl;

      // fingerprint tie-break (prevents nondeterminism when everything else matches)
      const fcmp = cmpStr(a.fingerprints?.primaryLocationLineHash ?? '', b.fingerprints?.primaryLocationLineHash ?? '');
      if (fcmp !== 0) return fcmp;

      return cmpStr(a.message.text, b.message.text);
    });

  return { ...run, tool: { ...run.tool, driver: { ...run.tool.driver, rules } }, results };
}

export function toSarif(result: ScanResult): SarifLog {
  const notes = engineStatusNotes(result.meta.engines);
  const rules: SarifRule[] = [...notes.rules];

  for (const f of result.findings) {
    rules.push({
      id: f.ruleId,
      name: f.title,
      shortDescription: { text: f.title },
      fullDescription: { text: f.rationale },
      help: { text: f.remediation },
      defaultConfiguration: { level: toSarifLevel(f.severity) },
    });
  }

  return {
    version: '2.1.0',
    $schema: SCHEMA,
    runs: [
      normalizeRun({
        tool: { driver: { name: 'mltriage', version: result.meta.ruleTableVersion, rules } },
        results: [...notes.results, ...result.findings.map((f) => findingToSarifResult(f, result.meta.redacted))],
      }),
    ],
  };
}

export function writeSarif(outDir: string, result: ScanResult): { path: string; log: SarifLog } {
  const log = toSarif(result);
  const dir = path.resolve(outDir);
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, 'results.sarif');
  fs.writeFileSync(file, JSON.stringify(log, null, 2));
  return { path: file, log };
}
