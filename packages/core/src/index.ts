// packages/core/src/index.ts
import crypto from 'node:crypto';
import path from 'node:path';
import type { ScanErrorKind } from './errors.js';
import type { ScanLimits } from './limits.js';

export * from './errors.js';
export * from './limits.js';
export * from './logger.js';

export type Severity = 'critical' | 'warn' | 'info';
export const SEVERITIES: readonly Severity[] = ['critical', 'warn', 'info'];

export function isSeverity(v: string): v is Severity {
  return (SEVERITIES as readonly string[]).includes(v);
}

/**
 * How an artifact's bytes should be demultiplexed, decided from its extension
 * by the directory walker.
 */
export type ExtensionClass = 'pickle' | 'torch' | 'numpy' | 'safetensors';

export interface ArtifactInput {
  path: string;
  extensionClass: ExtensionClass;
  bytes: Uint8Array;
}

export type Locator =
  | { kind: 'byte'; offset: number; entry?: string }
  | { kind: 'line'; line: number; column: number; cell?: number }
  | { kind: 'artifact' };

export interface FindingEvidence {
  excerpt?: string;
  excerptHash?: string;
  note: string;
}

export interface Finding {
  findingId: string;
  ruleId: string;
  title: string;
  severity: Severity;
  category: string;
  engineId: string;
  artifactPath: string;
  locator: Locator;
  rationale: string;
  remediation: string;
  evidence: FindingEvidence;
  errorKind?: ScanErrorKind;
  fingerprint: string;
}

/**
 * What a rule, classifier or engine emits before fingerprinting and redaction.
 */
export interface RawFinding {
  ruleId: string;
  title: string;
  severity: Severity;
  category: string;
  engineId: string;
  artifactPath: string;
  locator: Locator;
  rationale: string;
  remediation: string;
  evidence: string;
  note?: string;
  errorKind?: ScanErrorKind;
}

/**
 * ScanStatus answers: "Did the scan run and how complete was it?"
 * Gate answers: "Does this scan fail CI/policy based on failOn?"
 */
export type ScanStatus = 'COMPLETED' | 'PARTIAL' | 'FAILED';
export type GateStatus = 'PASS' | 'FAIL';
export type FailOn = 'critical' | 'warn' | 'none';

export interface ScanGate {
  status: GateStatus;
  failOn: FailOn;
  reason: string;
}

export interface ScanSummary {
  totalFindings: number;
  bySeverity: Record<Severity, number>;
  artifactsScanned: number;
  score: number;
  grade: 'A' | 'B' | 'C' | 'D' | 'F';
  scanStatus: ScanStatus;
  gate: ScanGate;
}

/**
 * Canonical engine IDs. Each maps to one of the artifact classes the tool inspects.
 */
export const AVAILABLE_ENGINES = ['models', 'source', 'notebooks', 'deps'] as const;
export type EngineId = (typeof AVAILABLE_ENGINES)[number];
export const DEFAULT_ENGINES: readonly EngineId[] = AVAILABLE_ENGINES;

export function isEngineId(v: string): v is EngineId {
  return (AVAILABLE_ENGINES as readonly string[]).includes(v);
}

export interface EngineExecutionMeta {
  engineId: EngineId;
  displayName: string;
  status: 'ok' | 'skipped' | 'failed';
  durationMs: number;
  artifacts: number;
  errorMessage?: string;
}

export type PathMode = 'relative' | 'absolute';

export interface ScanConfig {
  outDir: string;
  format: string[];
  /** Wall-clock seconds allowed per artifact. */
  timeout: number;
  concurrency: number;
  failOn: FailOn;
  redact: boolean;
  pathMode: PathMode;
  engines: EngineId[];
  /** Rule table YAML path; the bundled table when unset. */
  rules?: string;
  limits: ScanLimits;
  strictProtocol: boolean;
  advisoryUrl?: string;
}

export interface ScanMeta {
  scannedPath: string;
  generatedAt: string;
  timeout: number;
  concurrency: number;
  redacted: boolean;
  ruleTableVersion: string;
  engines: EngineExecutionMeta[];
}

export interface ScanResult {
  meta: ScanMeta;
  summary: ScanSummary;
  findings: Finding[];
}

export function stableHash(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex').slice(0, 16);
}

function normalizePathForKey(p: string): string {
  return String(p || '').replace(/\\/g, '/');
}

export function locatorKey(loc: Locator): string {
  if (loc.kind === 'byte') return `byte:${loc.entry ?? ''}@${loc.offset}`;
  if (loc.kind === 'line') return `line:${loc.cell ?? ''}:${loc.line}:${loc.column}`;
  return 'artifact';
}

/**
 * Suffix appended to an artifact path: `!entry@offset (0xhex)`, `[cell N]:line:col`
 * or `:line:col`. Artifact-level locators render as nothing.
 */
export function formatLocator(loc: Locator): string {
  if (loc.kind === 'byte') {
    const at = `@${loc.offset} (0x${loc.offset.toString(16)})`;
    return loc.entry ? `!${loc.entry}${at}` : at;
  }
  if (loc.kind === 'line') {
    const at = `:${loc.line}:${loc.column}`;
    return loc.cell !== undefined ? `[cell ${loc.cell}]${at}` : at;
  }
  return '';
}

/**
 * Sort tuple for a locator: entry name, then primary and secondary position.
 * Artifact-level locators sort before positional ones.
 */
function locatorOrder(loc: Locator): [string, number, number] {
  if (loc.kind === 'byte') return [loc.entry ?? '', loc.offset, 0];
  if (loc.kind === 'line') {
    return [loc.cell !== undefined ? `cell ${String(loc.cell).padStart(6, '0')}` : '', loc.line, loc.column];
  }
  return ['', -1, -1];
}

/**
 * Deterministic comparator (avoid locale/ICU differences across OS)
 */
function asciiCompare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

const SEVERITY_RANK: Record<Severity, number> = {
  critical: 3,
  warn: 2,
  info: 1,
};

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK[severity];
}

export function compareFindings(a: Finding, b: Finding): number {
  const file = asciiCompare(a.artifactPath, b.artifactPath);
  if (file !== 0) return file;

  const sev = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
  if (sev !== 0) return sev;

  const [ae, ap, as] = locatorOrder(a.locator);
  const [be, bp, bs] = locatorOrder(b.locator);
  const entry = asciiCompare(ae, be);
  if (entry !== 0) return entry;
  if (ap !== bp) return ap - bp;
  if (as !== bs) return as - bs;

  const rule = asciiCompare(a.ruleId, b.ruleId);
  if (rule !== 0) return rule;

  return asciiCompare(a.fingerprint, b.fingerprint);
}

/**
 * Stable report order: artifact path, severity descending, then locator.
 */
export function sortFindingsDeterministically(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}

export function findingFingerprint(artifactPath: string, ruleId: string, locator: Locator): string {
  return stableHash(`${normalizePathForKey(artifactPath)}:${ruleId}:${locatorKey(locator)}`);
}

export function toFinding(raw: RawFinding, redact: boolean): Finding {
  const artifactPath = normalizePathForKey(raw.artifactPath);
  const fingerprint = findingFingerprint(artifactPath, raw.ruleId, raw.locator);
  const note = raw.note ?? 'Static pattern match';

  return {
    findingId: `${raw.ruleId}-${fingerprint}`,
    ruleId: raw.ruleId,
    title: raw.title,
    severity: raw.severity,
    category: raw.category,
    engineId: raw.engineId,
    artifactPath,
    locator: raw.locator,
    rationale: raw.rationale,
    remediation: raw.remediation,
    evidence: redact
      ? { excerptHash: stableHash(raw.evidence), note: 'Redacted evidence' }
      : { excerpt: raw.evidence, note },
    ...(raw.errorKind ? { errorKind: raw.errorKind } : {}),
    fingerprint,
  };
}

/**
 * Within one artifact a (rule id, locator) pair is reported once; the first
 * occurrence wins.
 */
export function dedupeFindings(rawFindings: readonly RawFinding[], redact: boolean): Finding[] {
  const map = new Map<string, Finding>();
  for (const raw of rawFindings) {
    const finding = toFinding(raw, redact);
    const key = `${finding.artifactPath}|${finding.ruleId}|${locatorKey(finding.locator)}`;
    if (!map.has(key)) map.set(key, finding);
  }
  return [...map.values()];
}

export function findRelativeArtifactPath(filePath: string, baseDir: string, mode: PathMode): string {
  const normalizedBase = path.resolve(baseDir);
  const absolute = path.isAbsolute(filePath) ? path.resolve(filePath) : path.resolve(normalizedBase, filePath);
  if (mode === 'absolute') return normalizePathForKey(absolute);
  const rel = path.relative(normalizedBase, absolute);
  if (!rel || rel.startsWith('..')) return normalizePathForKey(absolute);
  return normalizePathForKey(rel);
}

export function shouldFail(bySeverity: Record<Severity, number>, failOn: FailOn): boolean {
  if (failOn === 'none') return false;
  if (failOn === 'critical') return bySeverity.critical > 0;
  return bySeverity.critical > 0 || bySeverity.warn > 0;
}

function gateReason(bySeverity: Record<Severity, number>, failOn: FailOn): string {
  if (failOn === 'none') return 'failOn=none (policy gate disabled)';
  if (failOn === 'critical') {
    return bySeverity.critical > 0 ? `critical=${bySeverity.critical} (>0)` : 'no critical findings';
  }
  if (bySeverity.critical > 0 || bySeverity.warn > 0) {
    return `critical=${bySeverity.critical}, warn=${bySeverity.warn} (threshold: warn+)`;
  }
  return 'no critical/warn findings';
}

/**
 * Derive scan completion from engine meta.
 * - COMPLETED: no engine failed
 * - PARTIAL: at least one ok AND some failed
 * - FAILED: no engine ok AND at least one failed
 */
export function deriveScanStatus(engines?: readonly EngineExecutionMeta[]): ScanStatus {
  const list = engines ?? [];
  const ok = list.some((e) => e.status === 'ok');
  const bad = list.some((e) => e.status === 'failed');

  if (ok && bad) return 'PARTIAL';
  if (!ok && bad) return 'FAILED';
  return 'COMPLETED';
}

export function summarize(
  findings: readonly Finding[],
  failOn: FailOn,
  opts?: { engines?: readonly EngineExecutionMeta[]; artifactsScanned?: number }
): ScanSummary {
  const bySeverity: Record<Severity, number> = { critical: 0, warn: 0, info: 0 };
  for (const finding of findings) bySeverity[finding.severity] += 1;

  const score = Math.max(0, 100 - bySeverity.critical * 30 - bySeverity.warn * 10);

  const grade: ScanSummary['grade'] =
    score >= 90 ? 'A' :
    score >= 80 ? 'B' :
    score >= 70 ? 'C' :
    score >= 60 ? 'D' : 'F';

  return {
    totalFindings: findings.length,
    bySeverity,
    artifactsScanned: opts?.artifactsScanned ?? 0,
    score,
    grade,
    scanStatus: deriveScanStatus(opts?.engines),
    gate: {
      status: shouldFail(bySeverity, failOn) ? 'FAIL' : 'PASS',
      failOn,
      reason: gateReason(bySeverity, failOn),
    },
  };
}
